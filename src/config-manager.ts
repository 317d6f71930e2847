import fs from 'fs/promises';
import { z } from 'zod';
import { CONFIG_ENV, resolveConfigFile } from './config.js';
import { LOG_LEVELS, isLogLevel, logger, setLogLevel } from './utils/logger.js';

const ConfigSchema = z.object({
    logLevel: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
    backupOnSave: z.boolean().default(false),
});

export type ServerConfig = z.infer<typeof ConfigSchema>;

const DEFAULT_CONFIG: ServerConfig = ConfigSchema.parse({});

/**
 * Loads and caches the editor configuration.
 * A missing file means defaults; an invalid one is reported and ignored.
 */
export class ConfigManager {
    private config: ServerConfig | null = null;

    constructor(
        private readonly configPath: string = resolveConfigFile(),
        private readonly env: NodeJS.ProcessEnv = process.env,
    ) {}

    get path(): string {
        return this.configPath;
    }

    async loadConfig(): Promise<ServerConfig> {
        const fromFile = await this.readFile();
        const config: ServerConfig = { ...fromFile };

        const envLevel = this.env[CONFIG_ENV.LOG_LEVEL];
        if (envLevel !== undefined && envLevel !== '') {
            if (isLogLevel(envLevel)) {
                config.logLevel = envLevel;
            } else {
                logger.warning(`Ignoring ${CONFIG_ENV.LOG_LEVEL}=${envLevel}; expected one of ${LOG_LEVELS.join(', ')}`);
            }
        }

        this.config = config;
        setLogLevel(config.logLevel);
        return config;
    }

    async getConfig(): Promise<ServerConfig> {
        return this.config ?? this.loadConfig();
    }

    async getValue<K extends keyof ServerConfig>(key: K): Promise<ServerConfig[K]> {
        const config = await this.getConfig();
        return config[key];
    }

    private async readFile(): Promise<ServerConfig> {
        let raw: string;
        try {
            raw = await fs.readFile(this.configPath, 'utf8');
        } catch {
            logger.debug(`No config at ${this.configPath}, using defaults`);
            return { ...DEFAULT_CONFIG };
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            logger.warning(`Config ${this.configPath} is not valid JSON, using defaults:`, error);
            return { ...DEFAULT_CONFIG };
        }

        const parsed = ConfigSchema.safeParse(json);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
            logger.warning(`Config ${this.configPath} is invalid (${issues}), using defaults`);
            return { ...DEFAULT_CONFIG };
        }
        return parsed.data;
    }
}

export const configManager = new ConfigManager();
