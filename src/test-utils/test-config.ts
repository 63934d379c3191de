import * as os from 'os';
import * as path from 'path';
import { AppConfig, buildAppConfig } from '../config/app.config';

export const TEST_SECRET_KEY = 'test-secret-test-secret-test-secret';

/**
 * Configuration as built from the given environment, with a fixed secret
 * and a throwaway upload directory unless overridden.
 */
export function createTestConfig(env: Record<string, string> = {}): AppConfig {
  const values: Record<string, string> = {
    NODE_ENV: 'test',
    SECRET_KEY: TEST_SECRET_KEY,
    UPLOAD_DIR: path.join(os.tmpdir(), 'feedback-test-uploads'),
    BCRYPT_ROUNDS: '4',
    ...env,
  };
  return buildAppConfig((key) => values[key]);
}
