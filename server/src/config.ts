import path from 'path';

export interface ServerConfig {
  port: number;
  dataFile: string;
}

const DEFAULT_PORT = 8787;
const DEFAULT_DATA_FILE = 'expenses.csv';

/** Read settings from the environment, falling back to defaults */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT);
  return {
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT,
    dataFile: path.resolve(env.EXPENSES_CSV || DEFAULT_DATA_FILE),
  };
}
