import chalk, { type ChalkInstance } from 'chalk';
import { STAGE_ORDER, type AttemptResult, type Report, type StageStatus } from '@patchproof/shared';

const STAGE_LABEL = {
  deploy: 'deploy',
  tests: 'tests',
  functional: 'functional',
  bulk: 'bulk',
  tweak: 'tweak',
} as const;

const STATUS_MARK: Record<StageStatus, string> = {
  pass: 'pass',
  fail: 'fail',
  error: 'error',
  skipped: 'skip',
};

/**
 * Plain-text rendering of a report for the terminal. Returns lines instead of printing.
 */
export class ReportRenderer {
  constructor(private readonly c: ChalkInstance = chalk) {}

  render(report: Report): string[] {
    return [...this.header(report), ...this.table(report.results), '', ...this.summary(report)];
  }

  badge(result: AttemptResult): string {
    switch (result.classification) {
      case 'resolved':
        return this.c.green.bold('PASS ');
      case 'failed':
        return this.c.red.bold('FAIL ');
      default:
        return this.c.red.bold('ERROR');
    }
  }

  private header(report: Report): string[] {
    const lines = [
      this.c.bold.cyan(`Run ${report.runId}`) + this.c.gray(` (model ${report.modelId})`),
      '='.repeat(80),
    ];
    if (report.cancelled) lines.push(this.c.yellow('Run was cancelled; results are partial.'));
    return lines;
  }

  private table(results: readonly AttemptResult[]): string[] {
    const idWidth = Math.max(4, ...results.map((r) => r.taskId.length));
    const head = ['      ', 'task'.padEnd(idWidth), 'score'.padStart(7), ...STAGE_ORDER.map((k) => STAGE_LABEL[k].padEnd(10))];
    const lines = [this.c.gray(head.join('  ').trimEnd())];

    for (const result of results) {
      const cells = STAGE_ORDER.map((kind) => {
        const stage = result.stages.find((s) => s.kind === kind);
        return this.stageCell(stage?.status);
      });
      const score = `${result.score}/${result.maxScore}`.padStart(7);
      lines.push([this.badge(result), result.taskId.padEnd(idWidth), score, ...cells].join('  ').trimEnd());
      if (result.failure) {
        const tag = result.failure.constraint ? ` [${result.failure.constraint}]` : '';
        lines.push(this.c.gray(`        ${result.failure.kind}${tag}: ${result.failure.message}`));
      }
    }
    return lines;
  }

  private stageCell(status: StageStatus | undefined): string {
    if (status === undefined) return ''.padEnd(10);
    const text = STATUS_MARK[status].padEnd(10);
    switch (status) {
      case 'pass':
        return this.c.green(text);
      case 'fail':
        return this.c.red(text);
      case 'error':
        return this.c.magenta(text);
      default:
        return this.c.gray(text);
    }
  }

  private summary(report: Report): string[] {
    const s = report.summary;
    const rate = s.resolutionRate * 100;
    const rateColor = rate > 80 ? this.c.green : rate > 50 ? this.c.yellow : this.c.red;
    return [
      this.c.bold.cyan('Summary'),
      `Tasks:          ${s.total}`,
      `- Resolved:     ${this.c.green(s.resolved)}`,
      `- Failed:       ${this.c.red(s.failed)}`,
      `- Errored:      ${this.c.red(s.errored)}`,
      `Resolution:     ${rateColor(`${rate.toFixed(2)}%`)}`,
      `Score:          avg ${s.averageScore}, median ${s.medianScore}, min ${s.minScore}, max ${s.maxScore}`,
      `Avg duration:   ${(s.averageDurationMs / 1000).toFixed(2)}s`,
      `Constraints:    ${s.platformConstraintFailures}`,
      `Empty patches:  ${s.emptyPatchCount}`,
    ];
  }
}
