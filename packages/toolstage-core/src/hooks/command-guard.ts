import path from 'path';
import type { BlockedFlag, HookConfig } from '../types/index.js';
import { ALLOW, type HookDecision, type HookEvent } from './types.js';

const SHELL_TOOLS = new Set(['Bash']);
const PREFIX_COMMANDS = new Set(['sudo', 'env', 'command', 'exec', 'nohup', 'time']);
// Options of a prefix command that take the next word as their value
const PREFIX_OPTION_ARGS: Partial<Record<string, ReadonlySet<string>>> = {
    sudo: new Set(['-u', '-g', '-h', '-p', '-C', '-D', '-r', '-t', '-U', '-T', '--user', '--group', '--host', '--prompt', '--chdir']),
    env: new Set(['-u', '-C', '-S', '--unset', '--chdir', '--split-string']),
    exec: new Set(['-a']),
    time: new Set(['-f', '-o', '--format', '--output']),
};
const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/**
 * Split a shell command line into segments of unquoted words.
 * Segments end at `&&`, `||`, `;`, `|` and newlines outside quotes.
 */
export function tokenizeCommand(command: string): string[][] {
    const segments: string[][] = [];
    let words: string[] = [];
    let word = '';
    let inWord = false;
    let quote: '"' | "'" | null = null;

    const endWord = () => {
        if (inWord) {
            words.push(word);
        }
        word = '';
        inWord = false;
    };
    const endSegment = () => {
        endWord();
        if (words.length > 0) {
            segments.push(words);
        }
        words = [];
    };

    for (let i = 0; i < command.length; i++) {
        const ch = command[i];

        if (quote) {
            if (ch === quote) {
                quote = null;
            } else if (ch === '\\' && quote === '"' && i + 1 < command.length) {
                word += command[++i];
            } else {
                word += ch;
            }
            continue;
        }

        if (ch === '"' || ch === "'") {
            quote = ch;
            inWord = true;
        } else if (ch === '\\' && i + 1 < command.length) {
            word += command[++i];
            inWord = true;
        } else if (ch === ';' || ch === '\n' || ch === '|' || ch === '&') {
            // `&&`, `||` and `|&` consume both characters
            const next = command[i + 1];
            if ((ch === '&' || ch === '|') && (next === '&' || next === '|')) {
                i++;
            }
            endSegment();
        } else if (/\s/.test(ch)) {
            endWord();
        } else {
            word += ch;
            inWord = true;
        }
    }
    endSegment();

    return segments;
}

function programIndex(words: string[]): number {
    let i = 0;
    while (i < words.length) {
        const word = words[i];
        if (ENV_ASSIGNMENT.test(word)) {
            i++;
            continue;
        }
        if (!PREFIX_COMMANDS.has(word)) {
            break;
        }
        const optionArgs = PREFIX_OPTION_ARGS[word];
        i++;
        while (i < words.length && words[i].startsWith('-')) {
            const option = words[i++];
            if (option === '--') {
                break;
            }
            if (optionArgs?.has(option)) {
                i++;
            }
        }
    }
    return i;
}

function hasFlag(args: string[], flag: string): boolean {
    return args.some(arg => arg === flag || arg.startsWith(`${flag}=`));
}

/**
 * First rule violated by any segment of the command, if one is.
 */
export function findBlockedFlag(command: string, rules: BlockedFlag[]): BlockedFlag | undefined {
    for (const words of tokenizeCommand(command)) {
        const idx = programIndex(words);
        if (idx >= words.length) {
            continue;
        }
        const program = path.basename(words[idx]);
        const args = words.slice(idx + 1);
        const rule = rules.find(r => r.command === program && hasFlag(args, r.flag));
        if (rule) {
            return rule;
        }
    }
    return undefined;
}

/**
 * Block shell commands run with a configured flag.
 */
export function checkBlockedFlags(event: HookEvent, config: HookConfig): HookDecision {
    const guard = config.command_guard;
    if (!guard.enabled || !event.tool_name || !SHELL_TOOLS.has(event.tool_name)) {
        return ALLOW;
    }

    const command = event.tool_input?.command;
    if (typeof command !== 'string' || command.trim().length === 0) {
        return ALLOW;
    }

    const rule = findBlockedFlag(command, guard.blocked_flags);
    if (!rule) {
        return ALLOW;
    }

    const why = rule.reason ? ` ${rule.reason}` : '';
    return {
        decision: 'block',
        reason: `Blocked: '${rule.command} ${rule.flag}' is not allowed.${why}`,
    };
}
