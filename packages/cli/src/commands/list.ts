/**
 * List command - Show the available scenarios
 */

import { SCENARIOS, type Scenario } from '@relaytest/scenarios';
import chalk from 'chalk';
import type { Command } from 'commander';

export function setupListCommand(program: Command, scenarios: readonly Scenario[] = SCENARIOS): void {
  program
    .command('list')
    .description('List the available scenarios')
    .action(() => {
      for (const scenario of scenarios) {
        const note = scenario.interactive ? chalk.yellow(' (interactive)') : '';
        console.log(`${chalk.bold(scenario.name.padEnd(20))}${scenario.description}${note}`);
      }
    });
}
