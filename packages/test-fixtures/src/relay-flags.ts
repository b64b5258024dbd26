import minimist from 'minimist';

interface Args {
  port?: string;
  methods?: string;
  methods_exclude?: string;
  backend_rpc_url?: string;
  backend_version?: string;
  server_jid?: string;
  client_jid?: string;
  waitforchange?: boolean;
  _: string[];
  [key: string]: unknown;
}

/**
 * The relay command-line flags the fake network acts on
 */
export type RelayFlags = {
  port?: number;
  backendRpcUrl?: string;
  backendVersion: string;
  serverJid?: string;
  clientJid?: string;
  /** --methods minus --methods_exclude */
  methods: ReadonlySet<string>;
  waitForChange: boolean;
};

function splitList(value: string | undefined): string[] {
  return (value ?? '').split(',').filter((entry) => entry !== '');
}

export function parseRelayFlags(args: readonly string[]): RelayFlags {
  const argv = minimist<Args>([...args], {
    string: [
      'port',
      'methods',
      'methods_exclude',
      'backend_rpc_url',
      'backend_version',
      'server_jid',
      'client_jid'
    ],
    boolean: ['waitforchange']
  });

  const excluded = new Set(splitList(argv.methods_exclude));
  const port = argv.port ? Number.parseInt(argv.port, 10) : undefined;

  return {
    port: port !== undefined && Number.isInteger(port) ? port : undefined,
    backendRpcUrl: argv.backend_rpc_url || undefined,
    backendVersion: argv.backend_version ?? '',
    serverJid: argv.server_jid || undefined,
    clientJid: argv.client_jid || undefined,
    methods: new Set(splitList(argv.methods).filter((method) => !excluded.has(method))),
    waitForChange: argv.waitforchange === true
  };
}
