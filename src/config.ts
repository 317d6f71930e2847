import path from 'path';
import process from 'process';
import os from 'os';

export const CONFIG_DIR = path.join(os.homedir(), '.docx-index-editor');

/** Environment variables the configuration honours. */
export const CONFIG_ENV = {
    CONFIG_FILE: 'DOCX_EDITOR_CONFIG',
    LOG_LEVEL: 'DOCX_EDITOR_LOG_LEVEL',
} as const;

export function resolveConfigFile(env: NodeJS.ProcessEnv = process.env): string {
    return env[CONFIG_ENV.CONFIG_FILE] || path.join(CONFIG_DIR, 'config.json');
}
