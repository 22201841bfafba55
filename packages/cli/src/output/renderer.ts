import pc from 'picocolors';
import type { TestCase } from '@exval/core';
import type { WrittenArtifact } from '@exval/eval';
import { formatValue, stringifyValue } from '@exval/shared';

/**
 * Everything the CLI prints that is not the validation report itself.
 * In JSON mode only structured documents reach stdout.
 */
export class OutputRenderer {
  constructor(private isJson: boolean) {}

  get json(): boolean {
    return this.isJson;
  }

  /** Prints a value as JSON, keeping non-finite floats */
  document(data: unknown): void {
    console.log(stringifyValue(data, 2));
  }

  renderCases(exercise: string, cases: readonly TestCase[]): void {
    if (this.isJson) {
      this.document({ exercise, cases });
      return;
    }
    console.log(pc.bold(`${cases.length} cases for "${exercise}":`));
    for (const testCase of cases) {
      const tag = testCase.classification === 'out-of-domain' ? pc.yellow(' out-of-domain') : '';
      console.log(
        `  ${pc.cyan(testCase.id)} ${pc.gray(`[${testCase.provenance}]`)}${tag} ${testCase.label}`,
      );
      console.log(pc.gray(`      input ${formatValue(testCase.input, 120)}`));
      if (testCase.expected !== undefined) {
        console.log(pc.gray(`      expected ${formatValue(testCase.expected, 120)}`));
      }
    }
  }

  renderArtifacts(written: readonly WrittenArtifact[]): void {
    if (this.isJson) return;
    const skipped = written[0]?.skippedCount ?? 0;
    console.log(pc.bold('\nTest artifacts:'));
    for (const artifact of written) {
      console.log(`  - ${artifact.candidateId}: ${artifact.testFile}`);
    }
    if (skipped > 0) {
      console.log(pc.yellow(`  ${skipped} cases are skipped: the reference gave no usable output for them.`));
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
