/**
 * gcc-forge - Configuration Loader
 * Parses config/toolchain.yaml. Every key has a default, so the file is
 * optional; environment variables override the file.
 *
 *   GCC_FORGE_CONFIG   path of the configuration file
 *   GCC_FORGE_WORKDIR  working directory (sources, build trees, install prefix)
 *   BUILD_TZ           clock zone used for date stamps
 *   TG_BOT_API, CHAT_ID, CHANNEL_ID, TOKEN_GITHUB  publishing credentials
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ValidationError } from './errors.js';

const CONFIG_FILE = join('config', 'toolchain.yaml');

// A section holding only comments parses as null
const section = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(value => value ?? {}, schema);

const configSchema = z.object({
  workDir: z.string().default('work'),
  patchesDir: z.string().default('patches'),
  toolPrefix: z.string().default('prebuilts'),
  // Existing directories to bind-mount over the stage build directories
  bindMountRoot: z.string().optional(),
  privilegeCommand: z.string().default('sudo'),
  timezone: z.string().default('UTC'),
  logging: section(z.object({
    file: z.string().optional(),
  })),
  downloader: section(z.object({
    segments: z.number().int().positive().default(16),
    connectionsPerServer: z.number().int().positive().default(16),
  })),
  publish: section(z.object({
    host: z.string().default('github.com'),
    owner: z.string().optional(),
    authorName: z.string().default('gcc-forge'),
    authorEmail: z.string().default('gcc-forge@localhost'),
  })),
  telegram: section(z.object({
    apiBase: z.string().url().default('https://api.telegram.org'),
  })),
});

export type ToolchainConfigFile = z.infer<typeof configSchema>;

export interface Credentials {
  botToken?: string;
  chatId?: string;
  channelId?: string;
  githubToken?: string;
}

export interface ToolchainConfig {
  configPath: string | null;
  workDir: string;
  patchesDir: string;
  toolPrefix: string;
  bindMountRoot?: string;
  privilegeCommand: string;
  timezone: string;
  logFile?: string;
  downloader: ToolchainConfigFile['downloader'];
  publish: ToolchainConfigFile['publish'];
  telegramApiBase: string;
  credentials: Credentials;
}

export interface LoadConfigOptions {
  configPath?: string;
  // Directory searched (upwards) for config/toolchain.yaml
  searchFrom?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Walk up from a directory until config/toolchain.yaml is found
 */
export function findConfigFile(start: string): string | null {
  let dir = resolve(start);

  while (true) {
    const candidate = join(dir, CONFIG_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Load configuration and resolve every path to an absolute one.
 * Relative paths are taken from the directory holding config/.
 */
export async function loadToolchainConfig(options: LoadConfigOptions = {}): Promise<ToolchainConfig> {
  const env = options.env ?? process.env;
  const searchFrom = options.searchFrom ?? process.cwd();
  const configPath = options.configPath
    ?? nonEmpty(env.GCC_FORGE_CONFIG)
    ?? findConfigFile(searchFrom);

  let raw: unknown = {};
  if (configPath) {
    const content = await readFile(configPath, 'utf-8');
    raw = parseYaml(content) ?? {};
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ValidationError(
      `Invalid configuration${configPath ? ` in ${configPath}` : ''}: ${issues.join('; ')}`,
      'Check config/toolchain.yaml against the documented keys'
    );
  }
  const file = parsed.data;

  const baseDir = configPath ? dirname(dirname(resolve(configPath))) : resolve(searchFrom);
  const abs = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p));

  const workDir = abs(nonEmpty(env.GCC_FORGE_WORKDIR) ?? file.workDir);
  const timezone = nonEmpty(env.BUILD_TZ) ?? file.timezone;
  if (!isTimeZone(timezone)) {
    throw new ValidationError(
      `Unknown time zone: ${timezone}`,
      'Set timezone in config/toolchain.yaml or BUILD_TZ to an IANA zone such as UTC or Europe/Berlin'
    );
  }

  return {
    configPath: configPath ? resolve(configPath) : null,
    workDir,
    patchesDir: abs(file.patchesDir),
    toolPrefix: isAbsolute(file.toolPrefix) ? file.toolPrefix : resolve(workDir, file.toolPrefix),
    bindMountRoot: file.bindMountRoot ? abs(file.bindMountRoot) : undefined,
    privilegeCommand: file.privilegeCommand.trim(),
    timezone,
    logFile: file.logging.file ? abs(file.logging.file) : undefined,
    downloader: file.downloader,
    publish: file.publish,
    telegramApiBase: file.telegram.apiBase,
    credentials: {
      botToken: nonEmpty(env.TG_BOT_API),
      chatId: nonEmpty(env.CHAT_ID),
      channelId: nonEmpty(env.CHANNEL_ID),
      githubToken: nonEmpty(env.TOKEN_GITHUB),
    },
  };
}
