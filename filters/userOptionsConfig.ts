/**
 * USER_OPTIONS: configuration for the footnote styler filter.
 *
 * The defaults below are the single source of truth. A YAML file named by the
 * FOOTNOTE_STYLER_CONFIG environment variable may override any of them, and
 * FOOTNOTE_STYLER_VERBOSE=true switches on verbose logging.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';

export interface FootnoteStylerOptions {
  /**
   * Substrings of the pandoc output format that enable the rewrite.
   * Matching is case-sensitive containment, so 'html' also matches 'html5'
   * and 'xhtml-strict', and 'pdf' matches 'pdf-6x9'.
   */
  formatPatterns: string[];
  spanClass: string; // Class put on the span that replaces each footnote
  logging: {
    verbose: boolean; // Per-footnote log lines on stderr
  };
  reporting: {
    enabled: boolean;
    reportsDir: string; // Relative paths resolve against the working directory
  };
}

export const USER_OPTIONS: FootnoteStylerOptions = {
  formatPatterns: ['pdf', 'html'],
  spanClass: 'footnote',
  logging: {
    verbose: false,
  },
  reporting: {
    enabled: false,
    reportsDir: 'reports',
  },
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const UserOptionsOverrideSchema = z
  .object({
    formatPatterns: z.array(z.string().min(1)).min(1),
    spanClass: z.string().min(1),
    logging: z.object({ verbose: z.boolean() }).partial(),
    reporting: z.object({ enabled: z.boolean(), reportsDir: z.string().min(1) }).partial(),
  })
  .partial()
  .strict();

export type UserOptionsOverride = z.infer<typeof UserOptionsOverrideSchema>;

/**
 * Merge validated overrides onto a set of options without touching either input.
 */
export function mergeUserOptions(base: FootnoteStylerOptions, override: UserOptionsOverride): FootnoteStylerOptions {
  return {
    formatPatterns: override.formatPatterns ? [...override.formatPatterns] : [...base.formatPatterns],
    spanClass: override.spanClass ?? base.spanClass,
    logging: { ...base.logging, ...override.logging },
    reporting: { ...base.reporting, ...override.reporting },
  };
}

/**
 * Parse the text of a YAML options file.
 * An empty file means no overrides.
 */
export function parseUserOptionsYaml(source: string, origin: string): UserOptionsOverride {
  let raw: unknown;
  try {
    raw = yaml.load(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${origin}: ${reason}`);
  }
  if (raw === undefined || raw === null) {
    return {};
  }
  const result = UserOptionsOverrideSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid options in ${origin}: ${details}`);
  }
  return result.data;
}

/**
 * Resolve the options for this run from USER_OPTIONS and the environment.
 *
 * @param env - Usually process.env (after dotenv has loaded .env)
 */
export function loadUserOptions(env: NodeJS.ProcessEnv = process.env): FootnoteStylerOptions {
  let options = mergeUserOptions(USER_OPTIONS, {});

  const configPath = env.FOOTNOTE_STYLER_CONFIG;
  if (configPath) {
    const resolved = path.resolve(process.cwd(), configPath);
    let source: string;
    try {
      source = fs.readFileSync(resolved, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Could not read options file ${resolved}: ${reason}`);
    }
    options = mergeUserOptions(options, parseUserOptionsYaml(source, resolved));
  }

  const verbose = env.FOOTNOTE_STYLER_VERBOSE;
  if (verbose !== undefined && verbose !== '') {
    options = mergeUserOptions(options, { logging: { verbose: verbose === 'true' || verbose === '1' } });
  }

  return options;
}
