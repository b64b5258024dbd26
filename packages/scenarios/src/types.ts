import type { FixtureOptions } from '@relaytest/test-utils';

export type ScenarioOptions = Omit<FixtureOptions, 'methods' | 'waitForChange'> & {
  /**
   * Disrupt the transport while load is running. Only the transport-restart
   * scenario uses it; the CLI asks the operator to restart the server.
   */
  disrupt?: () => Promise<void>;
  /** Pause between spammer iterations */
  spamIntervalMs?: number;
};

export type Scenario = {
  name: string;
  description: string;
  /** Needs a disrupt hook, so it cannot run unattended */
  interactive: boolean;
  run: (options: ScenarioOptions) => Promise<void>;
};
