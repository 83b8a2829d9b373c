/**
 * Reporting Service
 *
 * Keeps track of what the filter did to each footnote during a run and, when
 * reporting is switched on, writes a Markdown report to the reports directory
 * so a book build leaves a record behind.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { formatDate, logInfo, truncate } from '../utils/commonUtils';

export type FootnoteOutcome = 'styled' | 'passedThrough';

export interface FootnoteEvent {
  index: number; // 1-based position in document order
  format: string;
  outcome: FootnoteOutcome;
  preview: string;
}

const PREVIEW_LENGTH = 60;

/**
 * Service for collecting footnote events and writing reports
 */
export class ReportingService {
  private reportDirectory: string;
  private verbose: boolean;
  private events: FootnoteEvent[] = [];

  /**
   * @param reportDirectory Directory the reports are written to (created on demand)
   * @param verbose Whether each logged event is echoed to stderr
   */
  constructor(reportDirectory: string, verbose = false) {
    this.reportDirectory = path.resolve(reportDirectory);
    this.verbose = verbose;
  }

  /**
   * Log what happened to one footnote
   * @param format The output format of the run
   * @param outcome Whether the footnote was rewritten or left alone
   * @param text Plain text of the footnote body
   */
  logFootnote(format: string, outcome: FootnoteOutcome, text: string): void {
    const event: FootnoteEvent = {
      index: this.events.length + 1,
      format,
      outcome,
      preview: truncate(text.replace(/\s+/g, ' ').trim(), PREVIEW_LENGTH),
    };
    this.events.push(event);
    const verb = outcome === 'styled' ? 'Styled' : 'Left unchanged';
    logInfo(this.verbose, 'ReportingService', `${verb} footnote ${event.index} for '${format}': ${event.preview}`);
  }

  getEvents(): FootnoteEvent[] {
    return [...this.events];
  }

  countByOutcome(outcome: FootnoteOutcome): number {
    return this.events.filter(event => event.outcome === outcome).length;
  }

  resetStats(): void {
    this.events = [];
  }

  /**
   * Generate a report for all logged events
   * @returns The report in Markdown, or null if no footnotes were seen
   */
  generateReport(now: Date = new Date()): string | null {
    if (this.events.length === 0) {
      return null;
    }

    const dateString = formatDate(now);
    const timeString = now.toTimeString().split(' ')[0].replace(/:/g, '-');
    const formats = [...new Set(this.events.map(event => event.format))];

    return `---
title: Footnote Styler Report
date: ${dateString}
time: ${timeString}
---

# Footnote Styler Report

## Summary

- **Output Formats**: ${formats.map(format => `\`${format}\``).join(', ')}
- **Footnotes Seen**: ${this.events.length}
- **Styled As Spans**: ${this.countByOutcome('styled')}
- **Left Unchanged**: ${this.countByOutcome('passedThrough')}

## Footnotes

${this.formatEventList()}
`;
  }

  private formatEventList(): string {
    return this.events
      .map(event => {
        const label = event.outcome === 'styled' ? 'styled' : 'unchanged';
        return `${event.index}. (${label}) ${event.preview === '' ? '_empty_' : event.preview}`;
      })
      .join('\n');
  }

  private async lastReportIndex(dateString: string): Promise<number> {
    const pattern = new RegExp(`^${dateString}_Footnote-Styler-Report_(\\d+)\\.md$`);
    const entries = await fs.readdir(this.reportDirectory);
    let last = 0;
    for (const entry of entries) {
      const match = pattern.exec(entry);
      if (match) {
        last = Math.max(last, Number(match[1]));
      }
    }
    return last;
  }

  /**
   * Write the report to a file
   * @returns The path to the report file, or null if there was nothing to report
   */
  async writeReport(now: Date = new Date()): Promise<string | null> {
    const report = this.generateReport(now);
    if (!report) {
      return null;
    }
    await fs.mkdir(this.reportDirectory, { recursive: true });

    // YYYY-MM-DD_Footnote-Styler-Report_XX.md, XX counting up per day across runs
    const dateString = formatDate(now);
    const reportIndex = (await this.lastReportIndex(dateString)) + 1;
    const filename = `${dateString}_Footnote-Styler-Report_${String(reportIndex).padStart(2, '0')}.md`;
    const filePath = path.join(this.reportDirectory, filename);
    await fs.writeFile(filePath, report, 'utf8');
    logInfo(this.verbose, 'ReportingService', `Report written to ${filePath}`);

    this.resetStats();
    return filePath;
  }
}
