/**
 * @file Account Source
 *
 * Enumerates system accounts from a passwd-format file and decides which
 * of them the unlock dialog offers.
 *
 * @module accounts/passwd
 */

import fs from 'fs';

export interface AccountEntry {
    username: string;
    uid: number;
    shell: string;
}

/** Read-only account enumeration consumed by the unlock dialog. */
export interface AccountSource {
    accounts_list(): AccountEntry[];
}

const UID_MIN: number = 1000;
const UID_MAX: number = 6000;
const DISABLED_SHELLS: ReadonlySet<string> = new Set(['/bin/false', '/sbin/nologin']);

/**
 * Parse passwd(5) text. Comment, blank and malformed lines are skipped.
 */
export function passwd_parse(content: string): AccountEntry[] {
    const entries: AccountEntry[] = [];
    for (const line of content.split('\n')) {
        const trimmed: string = line.trim();
        if (!trimmed || trimmed.startsWith('#')) continue;

        const fields: string[] = trimmed.split(':');
        if (fields.length < 7) continue;

        const uid: number = Number.parseInt(fields[2], 10);
        if (!fields[0] || !Number.isInteger(uid)) continue;

        entries.push({ username: fields[0], uid, shell: fields[6] });
    }
    return entries;
}

/**
 * Whether an account is a person who may log in.
 */
export function account_isSelectable(entry: AccountEntry): boolean {
    return entry.uid >= UID_MIN && entry.uid <= UID_MAX && !DISABLED_SHELLS.has(entry.shell);
}

/**
 * Account source backed by a passwd file (default `/etc/passwd`).
 */
export class PasswdAccountSource implements AccountSource {
    constructor(private readonly filePath: string = '/etc/passwd') {}

    public accounts_list(): AccountEntry[] {
        let content: string;
        try {
            content = fs.readFileSync(this.filePath, 'utf-8');
        } catch (e: unknown) {
            const reason: string = e instanceof Error ? e.message : String(e);
            console.warn(`[accounts] cannot read ${this.filePath}: ${reason}`);
            return [];
        }
        return passwd_parse(content);
    }
}

/**
 * Fixed account list, for tests and trace replay.
 */
export class StaticAccountSource implements AccountSource {
    constructor(private readonly entries: AccountEntry[]) {}

    public accounts_list(): AccountEntry[] {
        return [...this.entries];
    }
}
