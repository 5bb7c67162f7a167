// ========================================
// Docker Command Gateway - Safety Validator
// ========================================

import type { ValidationVerdict } from './types.js';

export const MANAGEMENT_TOOL = 'docker';

export const ALLOWED_SUBCOMMANDS: ReadonlySet<string> = new Set([
    // process control
    'start', 'stop', 'restart',
    // introspection
    'logs', 'ps', 'inspect', 'stats', 'top', 'port', 'diff', 'images', 'version', 'info', 'system',
    // in-container execution
    'exec',
    // auditing
    'commit',
]);

export const DANGEROUS_PATTERNS: readonly string[] = [
    'rm -rf',
    'rmi -f',
    '--privileged',
    'sudo su',
    'mkfs',
    'fdisk',
];

const EXEC_MIN_TOKENS = 4;

// Quote characters and shell separators that may hug a word without being part of it.
const TOKEN_EDGE = /^['"`;&|()]+|['"`;&|()]+$/g;

function tokenize(command: string): string[] {
    return command.split(/\s+/).filter((t) => t.length > 0);
}

function bareWord(token: string): string {
    return token.replace(TOKEN_EDGE, '').toLowerCase();
}

// `rm`, `/bin/rm`, `./rm` and `\rm` all run the same binary.
function isRmWord(word: string): boolean {
    const program = word.replace(/^\\+/, '');
    return program.slice(program.lastIndexOf('/') + 1) === 'rm';
}

function isRecursiveFlag(flag: string): boolean {
    if (flag === '--recursive') return true;
    return /^-[a-z]+$/i.test(flag) && /r/i.test(flag);
}

function isForceFlag(flag: string): boolean {
    if (flag === '--force') return true;
    return /^-[a-z]+$/i.test(flag) && flag.includes('f');
}

/**
 * True when a standalone `rm` word (bare or path-qualified) is followed, anywhere later in the
 * command, by both a recursive and a force flag (clustered or separate).
 * `rm` inside a longer word (format, {{.rm}}, "rm":1) never counts.
 */
export function hasForcedRecursiveRemove(tokens: string[]): boolean {
    const words = tokens.map(bareWord);
    for (let i = 0; i < words.length; i++) {
        if (!isRmWord(words[i])) continue;
        const flags = words.slice(i + 1);
        if (flags.some(isRecursiveFlag) && flags.some(isForceFlag)) {
            return true;
        }
    }
    return false;
}

/**
 * Accept or reject a generated command. First failing rule wins.
 * Never rewrites the command.
 */
export function validate(command: string): ValidationVerdict {
    const trimmed = command.trim();

    if (!trimmed || !new RegExp(`^${MANAGEMENT_TOOL}\\s`).test(trimmed)) {
        return { accepted: false, rule: 'NOT_DOCKER', reason: `Command must start with '${MANAGEMENT_TOOL} '` };
    }

    const tokens = tokenize(trimmed);
    const subcommand = tokens[1];
    if (subcommand === undefined || !ALLOWED_SUBCOMMANDS.has(subcommand)) {
        return {
            accepted: false,
            rule: 'DISALLOWED_SUBCOMMAND',
            reason: `Subcommand '${subcommand ?? ''}' is not allowed`,
        };
    }

    if (subcommand === 'exec' && tokens.length < EXEC_MIN_TOKENS) {
        return {
            accepted: false,
            rule: 'EXEC_MISSING_COMMAND',
            reason: `'${MANAGEMENT_TOOL} exec' requires a container and a command`,
        };
    }

    const lower = trimmed.toLowerCase();
    for (const pattern of DANGEROUS_PATTERNS) {
        if (lower.includes(pattern)) {
            return { accepted: false, rule: 'DANGEROUS_PATTERN', reason: `Dangerous pattern detected: ${pattern}` };
        }
    }

    if (hasForcedRecursiveRemove(tokens)) {
        return { accepted: false, rule: 'RM_FORCE_RECURSIVE', reason: 'Forced recursive rm detected' };
    }

    return { accepted: true };
}
