import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ILogger } from '../src/interfaces/ILogger';

export class MemoryLogger implements ILogger {
    public readonly logs: string[] = [];

    log(message: string): void { this.logs.push(`[LOG] ${message}`); }
    warn(message: string): void { this.logs.push(`[WARN] ${message}`); }
    error(message: string, error?: unknown): void {
        this.logs.push(`[ERROR] ${message}${error instanceof Error ? ` ${error.message}` : ''}`);
    }
}

export function makeTempDir(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), `stepgen-${prefix}-`));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export const LOGIN_FEATURE = [
    'Feature: Login',
    '',
    '  Scenario: Successful login',
    '    Given the user is on the login page',
    '    When the user enters valid credentials',
    '    Then the user should be redirected to the dashboard',
    '',
    '  Scenario: Failed login',
    '    Given the user is on the login page',
    '    When the user enters invalid credentials',
    '    Then an error message should be displayed',
    '',
].join('\n');
