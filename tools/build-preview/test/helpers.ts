import * as path from 'path';
import type { CommandIO } from '../src/commands.js';
import type { CommandRunner } from '../src/modules/runner.js';

export const FIXTURES = path.join(__dirname, 'fixtures');

export function fixture(name: string): string {
    return path.join(FIXTURES, name);
}

export interface CapturedIO extends CommandIO {
    lines: string[];
    errors: string[];
}

export function captureIO(): CapturedIO {
    const lines: string[] = [];
    const errors: string[] = [];
    return {
        lines,
        errors,
        out: line => lines.push(line),
        err: line => errors.push(line)
    };
}

export class RecordingRunner implements CommandRunner {
    readonly calls: Array<[string, string]> = [];

    run(stage: string, command: string): void {
        this.calls.push([stage, command]);
    }
}
