import { Command } from 'commander';
import { ReportRenderer, readReport } from '@patchproof/core';
import type { GlobalOptions } from '../program';

export function registerReportCommand(program: Command) {
  program
    .command('report')
    .argument('<location>', 'report.json or the run directory holding it')
    .description('Render a saved run report')
    .action(async (location: string) => {
      const globalOpts = program.opts<GlobalOptions>();
      const report = await readReport(location);

      if (globalOpts.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      for (const line of new ReportRenderer().render(report)) console.log(line);
    });
}
