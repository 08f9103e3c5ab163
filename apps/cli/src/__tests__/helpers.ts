import { parseConfig, type CliConfig } from '../config/index.js';

export function testConfig(dataDir: string, env: NodeJS.ProcessEnv = {}): CliConfig {
  return parseConfig({
    CACHE_MIRROR_DATA_DIR: dataDir,
    ACCOUNT_SERVER_URL: 'https://files.example.test',
    ACCOUNT_USERNAME: 'alice',
    OPEN_QUIRK_FILTER: 'off',
    ...env,
  });
}
