import pc from 'picocolors';
import Table from 'cli-table3';
import type { Verification } from '@codecorpus/core';
import { formatCount, formatSigned } from '@codecorpus/shared';

/** Label/value pair shown in a stage summary table */
export type SummaryRow = [label: string, value: string];

export type Colors = ReturnType<typeof pc.createColors>;

export class OutputRenderer {
  constructor(
    private readonly isJson: boolean,
    private readonly colors: Colors = pc,
  ) {}

  get json(): boolean {
    return this.isJson;
  }

  /** Prints a stage result: the raw report in JSON mode, a summary table otherwise. */
  render(title: string, report: object, rows: SummaryRow[]): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    this.table(title, rows);
  }

  table(title: string, rows: SummaryRow[]): void {
    if (this.isJson) return;
    const table = new Table({ style: { head: [], border: [] } });
    for (const row of rows) {
      table.push(row);
    }
    console.log(`\n${this.colors.bold(title)}`);
    console.log(table.toString());
  }

  verification(verification: Verification): void {
    if (this.isJson) return;
    console.log(this.colors.bold('\nVerification:'));
    if (verification.status === 'skipped') {
      console.log(this.colors.gray(`  Skipped (${verification.reason})`));
      return;
    }
    for (const check of verification.checks) {
      const status = check.passed ? this.colors.green('PASS') : this.colors.red('FAIL');
      console.log(
        `  ${status} ${check.name}: expected ${formatCount(check.expected)}, actual ${formatCount(check.actual)} (diff ${formatSigned(check.diff)})`,
      );
    }
    for (const note of verification.notes) {
      console.log(this.colors.gray(`  ${note}`));
    }
  }

  /** Progress goes to stderr so stdout carries only the result. */
  progress(message: string): void {
    if (this.isJson) return;
    console.error(this.colors.gray(message));
  }

  log(message: string): void {
    if (this.isJson) return;
    console.log(message);
  }
}
