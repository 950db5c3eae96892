import fs from 'fs-extra';
import path from 'path';
import yaml from 'yaml';
import { ZodError } from 'zod';
import { ConfigSchema, type Config } from '../types/index.js';
import { ConfigError, errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';

export const CONFIG_FILE = 'toolstage.yml';

export const DEFAULT_CONFIG_YAML = `# toolstage configuration
version: 1

staging:
  # Directory holding one sub-directory per installable tool
  root: .strategic-claude-basic/tools
  default_tool: web_explorer

hooks:
  # PreToolUse guard for Write/Edit: blocks writes to these file names
  file_guard:
    enabled: true
    protected_files:
      - .env
      - .env.local
      - .mcp.json
      - package-lock.json

  # PreToolUse guard for Bash: blocks a command run with one of these flags
  command_guard:
    enabled: true
    blocked_flags:
      - command: git
        flag: --no-verify
        reason: Commit hooks must run; fix the failing check instead.
      - command: git
        flag: --force
        reason: Force pushes rewrite shared history.

  # Stop/Notification hook
  notify:
    enabled: true
    title: Assistant
    ntfy:
      enabled: false
      server_url: https://ntfy.sh
      topic: ""
    sound:
      enabled: false
      file: notification.mp3
      player: afplay
`;

export function getConfigPath(cwd: string): string {
    return path.join(cwd, CONFIG_FILE);
}

/**
 * Load toolstage.yml from cwd, falling back to defaults when absent.
 * Malformed YAML and schema violations throw ConfigError.
 */
export async function loadConfig(cwd: string): Promise<Config> {
    const configPath = getConfigPath(cwd);
    if (!(await fs.pathExists(configPath))) {
        Logger.debug(`No ${CONFIG_FILE} in ${cwd}, using defaults`);
        return ConfigSchema.parse({});
    }
    return parseConfig(await fs.readFile(configPath, 'utf-8'), configPath);
}

export function parseConfig(content: string, source = CONFIG_FILE): Config {
    let raw: unknown;
    try {
        raw = yaml.parse(content);
    } catch (error) {
        throw new ConfigError(source, `Invalid YAML in ${source}: ${errorMessage(error)}`, { cause: error });
    }

    try {
        return ConfigSchema.parse(raw ?? {});
    } catch (error) {
        if (error instanceof ZodError) {
            const issues = error.issues
                .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(source, `Invalid ${source}: ${issues}`, { cause: error });
        }
        throw error;
    }
}
