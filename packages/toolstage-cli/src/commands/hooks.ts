/**
 * `toolstage hooks init`: wire the guard and notify hooks into
 * .claude/settings.json.
 *
 * `toolstage hooks run <name>`: entry point the assistant host calls.
 * Reads the event JSON on stdin and exits 0 (allow), 2 (block, reason
 * on stderr) or 1 (hook error, non-blocking).
 */

import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import {
    EXIT_FAIL,
    HOOK_NAMES,
    SETTINGS_PATH,
    errorMessage,
    evaluateHook,
    generateHookSettings,
    isHookName,
    loadConfig,
    mergeHookSettings,
    parseHookEvent,
    type HookEvent,
    type HookOutcome,
    type NotificationTransport,
} from '@toolstage/core';

export interface HooksInitOptions {
    dryRun?: boolean;
    force?: boolean;
    command?: string;
}

export interface HooksRunOptions {
    /** Event payload; read from stdin when omitted */
    input?: string;
    transport?: NotificationTransport;
}

/**
 * Project-local binary when installed, else the global one.
 */
export function resolveHookCommand(cwd: string): string {
    const localBin = path.join(cwd, 'node_modules', '.bin', 'toolstage');
    return fs.existsSync(localBin) ? 'npx toolstage' : 'toolstage';
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readSettings(settingsPath: string): Promise<Record<string, unknown>> {
    if (!(await fs.pathExists(settingsPath))) {
        return {};
    }
    const raw = (await fs.readFile(settingsPath, 'utf-8')).trim();
    if (!raw) {
        return {};
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new Error(`Cannot update ${SETTINGS_PATH}: ${errorMessage(error)}`);
    }
    if (!isRecord(parsed)) {
        throw new Error(`Cannot update ${SETTINGS_PATH}: expected a JSON object`);
    }
    return parsed;
}

/**
 * Write (or merge) the hook wiring. Returns the settings written, or
 * undefined in dry-run mode.
 */
export async function writeHookSettings(
    cwd: string,
    options: HooksInitOptions = {},
): Promise<Record<string, unknown> | undefined> {
    const baseCommand = options.command ?? resolveHookCommand(cwd);
    const settingsPath = path.join(cwd, SETTINGS_PATH);
    const generated = generateHookSettings(baseCommand);

    const existing = options.force ? {} : await readSettings(settingsPath);
    const settings = mergeHookSettings(existing, generated);

    if (options.dryRun) {
        console.log(chalk.cyan(`\nDry run: ${SETTINGS_PATH} would contain:\n`));
        console.log(JSON.stringify(settings, null, 2));
        console.log('');
        return undefined;
    }

    await fs.ensureDir(path.dirname(settingsPath));
    await fs.writeFile(settingsPath, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
    console.log(chalk.green(`  UPDATE ${SETTINGS_PATH}`));
    console.log(chalk.dim(`         PreToolUse guards and Stop notification via '${baseCommand}'`));
    return settings;
}

export async function hooksInitCommand(cwd: string, options: HooksInitOptions = {}): Promise<void> {
    console.log(chalk.blue('\nHook Setup\n'));
    try {
        await writeHookSettings(cwd, options);
    } catch (error) {
        console.error(chalk.red(errorMessage(error)));
        process.exitCode = EXIT_FAIL;
        return;
    }
    if (!options.dryRun) {
        console.log(chalk.dim('\nHooks take effect in the next assistant session.\n'));
    }
}

async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString('utf-8');
}

function fail(message: string): HookOutcome | undefined {
    process.stderr.write(`toolstage hook error: ${message}\n`);
    process.exitCode = EXIT_FAIL;
    return undefined;
}

export async function hooksRunCommand(
    cwd: string,
    name: string,
    options: HooksRunOptions = {},
): Promise<HookOutcome | undefined> {
    if (!isHookName(name)) {
        return fail(`unknown hook '${name}'. Valid: ${HOOK_NAMES.join(', ')}`);
    }

    let event: HookEvent;
    try {
        event = parseHookEvent(options.input ?? await readStdin());
    } catch (error) {
        return fail(errorMessage(error));
    }

    // Config errors exit 1; only a guard decision exits 2
    let outcome: HookOutcome;
    try {
        const config = await loadConfig(event.cwd ?? cwd);
        outcome = await evaluateHook(name, event, config.hooks, options.transport);
    } catch (error) {
        return fail(errorMessage(error));
    }

    if (outcome.stderr) {
        process.stderr.write(`${outcome.stderr}\n`);
    }
    process.exitCode = outcome.exitCode;
    return outcome;
}
