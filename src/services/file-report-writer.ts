import * as fs from 'fs';
import * as path from 'path';
import type { ReportMailer } from './email-service';

/** Dry-run delivery: writes the rendered HTML to a file instead of mailing it. */
export class FileReportWriter implements ReportMailer {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async send(subject: string, html: string): Promise<void> {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, html, 'utf-8');
    console.error(`[out] "${subject}" written to ${this.filePath}`);
  }
}
