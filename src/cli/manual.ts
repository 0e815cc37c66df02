import fs from 'node:fs/promises';
import path from 'node:path';
import type { Command, Option } from 'commander';

export const MANUAL_FORMATS = ['manpages', 'markdown'] as const;
export type ManualFormat = (typeof MANUAL_FORMATS)[number];

export interface ManualPage {
    file: string;
    content: string;
}

function cell(text: string) {
    return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function defaultText(option: Option): string | undefined {
    const value: unknown = option.defaultValue;
    if (value === undefined || value === false || (Array.isArray(value) && value.length === 0)) {
        return undefined;
    }
    return typeof value === 'string' ? value : JSON.stringify(value);
}

function describeOption(option: Option, code: (text: string) => string) {
    const notes: string[] = [];
    if (option.argChoices && option.argChoices.length > 0) {
        notes.push(`one of ${option.argChoices.map(code).join(', ')}`);
    }
    if (option.envVar) {
        notes.push(`env ${code(option.envVar)}`);
    }
    return notes.length > 0 ? `${option.description} (${notes.join('; ')})` : option.description;
}

function commandPath(command: Command): string {
    const parent = command.parent;
    return parent ? `${commandPath(parent)} ${command.name()}` : command.name();
}

function rootOf(command: Command): Command {
    return command.parent ? rootOf(command.parent) : command;
}

function flatten(command: Command): Command[] {
    return [command, ...command.commands.flatMap(flatten)];
}

const markdownCode = (text: string) => `\`${text}\``;

function renderCommand(command: Command, depth: number, out: string[]) {
    const heading = '#'.repeat(Math.min(depth, 6));
    out.push(`${heading} ${commandPath(command)}`, '');
    if (command.description()) {
        out.push(command.description(), '');
    }
    out.push('```', `${commandPath(command)} ${command.usage()}`, '```', '');
    if (command.options.length > 0) {
        out.push('| Option | Description | Default |', '| --- | --- | --- |');
        for (const option of command.options) {
            const fallback = defaultText(option);
            out.push(
                `| \`${cell(option.flags)}\` | ${cell(describeOption(option, markdownCode))} | ${fallback === undefined ? '' : cell(markdownCode(fallback))} |`
            );
        }
        out.push('');
    }
    for (const sub of command.commands) {
        renderCommand(sub, depth + 1, out);
    }
}

/** Markdown reference of a command tree, built from its own definition. */
export function renderMarkdown(root: Command): string {
    const out: string[] = [];
    renderCommand(root, 1, out);
    return `${out.join('\n').trimEnd()}\n`;
}

function roff(text: string) {
    const escaped = text.replace(/\\/g, '\\e').replace(/-/g, '\\-');
    // a leading dot or quote would be read as a request
    return /^[.']/.test(escaped) ? `\\&${escaped}` : escaped;
}

function pageName(command: Command) {
    return commandPath(command).replace(/ /g, '-');
}

function renderManpage(command: Command): string {
    const root = rootOf(command);
    const version = root.version();
    const name = pageName(command);
    const out = [
        `.TH ${name.toUpperCase()} 1 "" "${root.name()}${version === undefined ? '' : ` ${version}`}"`,
        '.SH NAME',
        `${roff(name)} \\- ${roff(command.description())}`,
        '.SH SYNOPSIS',
        `\\fB${roff(commandPath(command))}\\fR ${roff(command.usage())}`
    ];
    if (command.options.length > 0) {
        out.push('.SH OPTIONS');
        for (const option of command.options) {
            out.push('.TP', `\\fB${roff(option.flags)}\\fR`, roff(describeOption(option, (text) => text)));
            const fallback = defaultText(option);
            if (fallback !== undefined) {
                out.push(`[default: ${roff(fallback)}]`);
            }
        }
    }
    if (command.commands.length > 0) {
        out.push('.SH SUBCOMMANDS');
        for (const sub of command.commands) {
            out.push('.TP', `${roff(pageName(sub))}(1)`, roff(sub.description()));
        }
    }
    if (version !== undefined) {
        out.push('.SH VERSION', `v${roff(version)}`);
    }
    return `${out.join('\n')}\n`;
}

/** One roff page per command, named like `tool.1` and `tool-sub.1`. */
export function renderManpages(root: Command): ManualPage[] {
    return flatten(root).map((command) => ({ file: `${pageName(command)}.1`, content: renderManpage(command) }));
}

export function renderManual(root: Command, format: ManualFormat): ManualPage[] {
    if (format === 'manpages') {
        return renderManpages(root);
    }
    return [{ file: `${root.name()}.md`, content: renderMarkdown(root) }];
}

export async function writeManual(root: Command, outDir: string, format: ManualFormat): Promise<string[]> {
    await fs.mkdir(outDir, { recursive: true });
    const targets: string[] = [];
    for (const page of renderManual(root, format)) {
        const target = path.join(outDir, page.file);
        await fs.writeFile(target, page.content, 'utf8');
        targets.push(target);
    }
    return targets;
}
