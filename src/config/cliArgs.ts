import { z } from 'zod';

export type CliArgs = {
  port?: number;
  apiToken?: string;
};

const portSchema = z.coerce.number().int().min(1).max(65_535);

const FLAG_KEYS: Record<string, keyof CliArgs | undefined> = {
  '--port': 'port',
  '--teslafi_api_token': 'apiToken',
};

const assign = (accumulator: CliArgs, key: keyof CliArgs, value: string): CliArgs => {
  if (key === 'port') {
    return { ...accumulator, port: portSchema.parse(value) };
  }

  return { ...accumulator, apiToken: value };
};

/**
 * Reads `--port` and `--teslafi_api_token`, written either as `--flag=value`
 * or as `--flag value`. Unknown arguments are ignored.
 */
export const parseCliArgs = (argv: string[]): CliArgs => {
  const { args } = argv.reduce<{ args: CliArgs; pending?: keyof CliArgs }>(
    (state, arg) => {
      if (state.pending) {
        return { args: assign(state.args, state.pending, arg) };
      }

      const separator = arg.indexOf('=');
      const flag = separator === -1 ? arg : arg.slice(0, separator);
      const key = FLAG_KEYS[flag];
      if (!key) {
        return state;
      }

      if (separator === -1) {
        return { args: state.args, pending: key };
      }

      return { args: assign(state.args, key, arg.slice(separator + 1)) };
    },
    { args: {} },
  );

  return args;
};
