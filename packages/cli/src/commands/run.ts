/**
 * Run command - Run scenarios against the relay binaries
 */

import { createInterface } from 'node:readline/promises';
import { isLogLevel, toErrorInfo } from '@relaytest/core';
import { SCENARIOS, type Scenario, type ScenarioOptions } from '@relaytest/scenarios';
import chalk from 'chalk';
import type { Command } from 'commander';

interface RunOptions {
  profile?: string;
  logLevel?: string;
  startupGrace?: string;
}

export type RunDependencies = {
  scenarios: readonly Scenario[];
  /** Block until the operator confirms */
  prompt: (message: string) => Promise<void>;
  env: NodeJS.ProcessEnv;
};

async function promptEnter(message: string): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await rl.question(`${message}\n`);
  } finally {
    rl.close();
  }
}

const defaultDependencies: RunDependencies = {
  scenarios: SCENARIOS,
  prompt: promptEnter,
  env: process.env
};

/**
 * Pick the scenarios to run; without names every unattended one
 */
function selectScenarios(all: readonly Scenario[], names: readonly string[]): Scenario[] {
  if (names.length === 0) {
    return all.filter((scenario) => !scenario.interactive);
  }

  return names.map((name) => {
    const scenario = all.find((s) => s.name === name);
    if (!scenario) {
      throw new Error(`Unknown scenario: ${name}`);
    }
    return scenario;
  });
}

function buildOptions(options: RunOptions, deps: RunDependencies): ScenarioOptions {
  const { logLevel, startupGrace } = options;
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new Error(`Invalid log level: ${logLevel}`);
  }

  const startupGraceMs = startupGrace === undefined ? undefined : Number.parseInt(startupGrace, 10);
  if (startupGraceMs !== undefined && !(startupGraceMs >= 0)) {
    throw new Error(`Invalid startup grace: ${String(startupGrace)}`);
  }

  return {
    env: options.profile ? { ...deps.env, RELAYTEST_PROFILE: options.profile } : deps.env,
    logLevel,
    timing: startupGraceMs === undefined ? undefined : { startupGraceMs },
    disrupt: () => deps.prompt('Restart the transport server and press Enter to continue...')
  };
}

export function setupRunCommand(program: Command, deps: RunDependencies = defaultDependencies): void {
  program
    .command('run [names...]')
    .description('Run scenarios against the relay binaries')
    .option('--profile <name>', 'transport server profile (local or chat)')
    .option('--log-level <level>', 'level of the fixture logs')
    .option('--startup-grace <ms>', 'time given to each relay binary to start')
    .action(async (names: string[], options: RunOptions) => {
      let selected: Scenario[];
      let scenarioOptions: ScenarioOptions;
      try {
        selected = selectScenarios(deps.scenarios, names);
        scenarioOptions = buildOptions(options, deps);
      } catch (error) {
        console.error(chalk.red(toErrorInfo(error).message));
        process.exit(1);
      }

      for (const scenario of selected) {
        console.log(chalk.blue(`▶ ${scenario.name}`));
        try {
          await scenario.run(scenarioOptions);
        } catch (error) {
          console.error(chalk.red(`✖ ${scenario.name}: ${toErrorInfo(error).message}`));
          process.exit(1);
        }
        console.log(chalk.green(`✔ ${scenario.name}`));
      }

      console.log(chalk.green(`\n${selected.length} scenario(s) passed`));
    });
}
