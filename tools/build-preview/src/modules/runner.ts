import type { ImageforgeLogger } from '@imageforge/build-logger';
import { expandTemplate, type TemplateMapping } from '@imageforge/placeholder-resolver';

export interface CommandRunner {
    run(stage: string, command: string): void;
}

export type LineWriter = (line: string) => void;

const RULE = '='.repeat(60);

/** Prints each stage's command instead of executing it. */
export class PrintingRunner implements CommandRunner {
    constructor(private readonly write: LineWriter) { }

    run(stage: string, command: string): void {
        this.write('');
        this.write(RULE);
        this.write(`Stage: ${stage}`);
        this.write(RULE);
        this.write(command);
    }
}

export interface ExpandedCommand {
    stage: string;
    command: string;
}

/** Expand every stage's command template, in order, and hand it to the runner. */
export function executeCommands(
    commands: Record<string, string>,
    context: TemplateMapping,
    runner: CommandRunner,
    logger?: ImageforgeLogger
): ExpandedCommand[] {
    const expanded: ExpandedCommand[] = [];

    for (const [stage, template] of Object.entries(commands)) {
        const command = expandTemplate(template, context, undefined, logger);
        runner.run(stage, command);
        expanded.push({ stage, command });
    }

    return expanded;
}
