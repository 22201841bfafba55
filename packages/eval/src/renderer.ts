import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import { describeOutcome, formatValue } from '@exval/shared';
import type { CandidateSummary, CaseVerdict, ValidationReport } from './verdict';

export interface RendererOptions {
  /** Defaults to the terminal's support */
  color?: boolean;
  /** Print matching cases too, not just failures */
  verbose?: boolean;
}

export function describeVerdict(verdict: CaseVerdict): string {
  switch (verdict.kind) {
    case 'match':
      return 'match';
    case 'mismatch':
      return `mismatch at ${verdict.path}: ${verdict.reason}`;
    case 'candidate-error':
      return `candidate error: ${describeOutcome(verdict.outcome)}`;
    case 'reference-error':
      return `reference error (${verdict.reason}): ${verdict.detail}`;
  }
}

/**
 * Human-readable console report of a validation run.
 */
export class ReportRenderer {
  private readonly c: ChalkInstance;
  private readonly verbose: boolean;

  constructor(options: RendererOptions = {}) {
    let level: ColorSupportLevel = chalk.level;
    if (options.color === false) level = 0;
    else if (options.color && level === 0) level = 1;
    this.c = new Chalk({ level });
    this.verbose = options.verbose ?? false;
  }

  logValidationStarted(exercise: string, caseCount: number, candidateCount: number) {
    console.log(this.c.bold.cyan(`\nValidating exercise: "${exercise}"`));
    console.log(this.c.gray(`${caseCount} cases, ${candidateCount} candidates`));
    console.log('='.repeat(80));
  }

  logReport(report: ValidationReport) {
    for (const line of this.render(report)) {
      console.log(line);
    }
  }

  render(report: ValidationReport): string[] {
    const lines: string[] = [];
    const referenceFailures = Object.entries(report.referenceOutcomes).filter(
      ([, outcome]) => outcome.kind !== 'success',
    );

    if (referenceFailures.length > 0) {
      lines.push(this.c.yellow.bold(`Reference "${report.referenceId}" failed on ${referenceFailures.length} cases:`));
      for (const [caseId, outcome] of referenceFailures) {
        lines.push(this.c.yellow(`  ${caseId}: ${describeOutcome(outcome)}`));
      }
    }

    for (const [candidateId, summary] of Object.entries(report.summaries)) {
      lines.push(`${this.badge(summary)} ${this.c.bold(candidateId)} ${this.c.gray(this.counts(summary))}`);
      for (const verdict of report.verdicts[candidateId] ?? []) {
        if (verdict.kind === 'match' && !this.verbose) continue;
        lines.push(this.verdictLine(verdict));
      }
    }

    lines.push('='.repeat(80));
    const summaries = Object.values(report.summaries);
    const passed = summaries.filter((s) => s.status === 'pass').length;
    lines.push(
      `Candidates: ${summaries.length}  ` +
        `Passed: ${this.c.green(passed)}  ` +
        `Failed: ${this.c.red(summaries.length - passed)}`,
    );
    if (!report.complete) {
      lines.push(this.c.yellow(`Run cancelled after ${report.cases.length} cases; results are incomplete.`));
    }
    return lines;
  }

  private badge(summary: CandidateSummary): string {
    switch (summary.status) {
      case 'pass':
        return this.c.green.bold('PASS');
      case 'fail':
        return this.c.red.bold('FAIL');
      case 'incomplete':
        return this.c.yellow.bold('INCOMPLETE');
    }
  }

  private counts(summary: CandidateSummary): string {
    return (
      `${summary.matched}/${summary.total} matched, ${summary.mismatched} mismatched, ` +
      `${summary.candidateErrors} candidate errors, ${summary.referenceErrors} reference errors`
    );
  }

  private verdictLine(verdict: CaseVerdict): string {
    const text = `  ${verdict.caseId}: ${describeVerdict(verdict)}`;
    switch (verdict.kind) {
      case 'match':
        return this.c.green(text);
      case 'mismatch':
        return this.c.red(`${text}\n    expected ${formatValue(verdict.expected)}\n    actual   ${formatValue(verdict.actual)}`);
      case 'candidate-error':
        return this.c.red(text);
      case 'reference-error':
        return this.c.yellow(text);
    }
  }
}
