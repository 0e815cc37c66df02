import fs from 'node:fs/promises';
import path from 'node:path';
import type { Command, Option } from 'commander';

export const SHELLS = ['bash', 'zsh', 'fish', 'elvish', 'powershell'] as const;
export type Shell = (typeof SHELLS)[number];

interface FlagSpec {
    short?: string;
    long?: string;
    description: string;
    /** Set when the flag takes a value. */
    valueName?: string;
    choices: readonly string[];
    repeatable: boolean;
}

interface CommandSpec {
    path: string[];
    name: string;
    description: string;
    flags: FlagSpec[];
    subcommands: CommandSpec[];
}

function toFlag(option: Option): FlagSpec {
    const takesValue = option.required || option.optional;
    const placeholder = /[<[]([^>\]]+)[>\]]/.exec(option.flags)?.[1];
    return {
        short: option.short,
        long: option.long,
        description: option.description,
        valueName: takesValue ? (placeholder ?? 'value') : undefined,
        choices: option.argChoices ?? [],
        repeatable: Array.isArray(option.defaultValue)
    };
}

function describeTree(command: Command, parent: string[] = []): CommandSpec {
    const specPath = [...parent, command.name()];
    return {
        path: specPath,
        name: command.name(),
        description: command.description(),
        flags: command.createHelp().visibleOptions(command).map(toFlag),
        subcommands: command.commands.map((sub) => describeTree(sub, specPath))
    };
}

function flatten(spec: CommandSpec): CommandSpec[] {
    return [spec, ...spec.subcommands.flatMap(flatten)];
}

function flagNames(flag: FlagSpec) {
    return [flag.short, flag.long].filter((name): name is string => name !== undefined);
}

function renderBash(root: CommandSpec) {
    const key = (spec: CommandSpec) => spec.path.join('__');
    const specs = flatten(root);
    const lines = [
        `_${root.name}() {`,
        '    local cur prev cmd i',
        '    cur="${COMP_WORDS[COMP_CWORD]}"',
        '    prev="${COMP_WORDS[COMP_CWORD-1]}"',
        `    cmd="${root.name}"`,
        '    for ((i = 1; i < COMP_CWORD; i++)); do',
        '        case "${cmd},${COMP_WORDS[i]}" in'
    ];
    for (const spec of specs) {
        for (const sub of spec.subcommands) {
            lines.push(`            ${key(spec)},${sub.name}) cmd="${key(sub)}" ;;`);
        }
    }
    lines.push('        esac', '    done', '', '    case "${cmd}" in');
    for (const spec of specs) {
        lines.push(`        ${key(spec)})`);
        const valued = spec.flags.filter((flag) => flag.valueName !== undefined);
        if (valued.length > 0) {
            lines.push('            case "${prev}" in');
            for (const flag of valued) {
                const reply =
                    flag.choices.length > 0
                        ? `COMPREPLY=($(compgen -W "${flag.choices.join(' ')}" -- "\${cur}"))`
                        : 'COMPREPLY=($(compgen -f -- "${cur}"))';
                lines.push(`                ${flagNames(flag).join('|')}) ${reply}; return 0 ;;`);
            }
            lines.push('            esac');
        }
        const words = [...spec.flags.flatMap(flagNames), ...spec.subcommands.map((sub) => sub.name)];
        lines.push(`            COMPREPLY=($(compgen -W "${words.join(' ')}" -- "\${cur}"))`, '            ;;');
    }
    lines.push('    esac', '}', '', `complete -F _${root.name} -o bashdefault -o default ${root.name}`);
    return lines;
}

function zshQuote(text: string) {
    return text.replace(/'/g, "'\\''");
}

function zshHelp(text: string) {
    return zshQuote(text.replace(/\\/g, '\\\\').replace(/([[\]:$`])/g, '\\$1'));
}

function zshFlagSpecs(flag: FlagSpec) {
    const help = zshHelp(flag.description);
    const repeat = flag.repeatable ? '*' : '';
    const action =
        flag.valueName === undefined
            ? ''
            : `:${flag.valueName}:${flag.choices.length > 0 ? `(${flag.choices.map(zshQuote).join(' ')})` : '_files'}`;
    const specs: string[] = [];
    if (flag.short) {
        specs.push(`'${repeat}${flag.short}${flag.valueName === undefined ? '' : '+'}[${help}]${action}'`);
    }
    if (flag.long) {
        specs.push(`'${repeat}${flag.long}${flag.valueName === undefined ? '' : '='}[${help}]${action}'`);
    }
    return specs;
}

function renderZsh(root: CommandSpec) {
    const fn = (spec: CommandSpec) => `_${spec.path.join('__')}`;
    const lines = [`#compdef ${root.name}`, ''];
    for (const spec of flatten(root)) {
        const specs = spec.flags.flatMap(zshFlagSpecs);
        if (spec.subcommands.length > 0) {
            specs.push(`':: :${fn(spec)}_commands'`, "'*::: :->args'");
        }
        lines.push(
            `${fn(spec)}() {`,
            '    local context curcontext="$curcontext" state line',
            '    typeset -A opt_args',
            '',
            `    _arguments -s -C \\`,
            ...specs.map((entry, index) => `        ${entry}${index < specs.length - 1 ? ' \\' : ''}`)
        );
        if (spec.subcommands.length > 0) {
            lines.push(
                '',
                '    case $state in',
                '        (args)',
                '            words=($line[1] "${words[@]}")',
                '            (( CURRENT += 1 ))',
                `            curcontext="\${curcontext%:*:*}:${spec.path.join('-')}-command-$line[1]:"`,
                '            case $line[1] in',
                ...spec.subcommands.map((sub) => `                (${sub.name}) ${fn(sub)} ;;`),
                '            esac',
                '            ;;',
                '    esac'
            );
        }
        lines.push('}', '');
        if (spec.subcommands.length > 0) {
            lines.push(
                `(( $+functions[${fn(spec)}_commands] )) ||`,
                `${fn(spec)}_commands() {`,
                '    local commands; commands=(',
                ...spec.subcommands.map(
                    (sub) => `        '${zshQuote(sub.name.replace(/:/g, '\\:'))}:${zshQuote(sub.description.replace(/:/g, '\\:'))}'`
                ),
                '    )',
                `    _describe -t commands '${spec.path.join(' ')} commands' commands "$@"`,
                '}',
                ''
            );
        }
    }
    lines.push(
        `if [ "$funcstack[1]" = "_${root.name}" ]; then`,
        `    _${root.name} "$@"`,
        'else',
        `    compdef _${root.name} ${root.name}`,
        'fi'
    );
    return lines;
}

function fishQuote(text: string) {
    return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function renderFish(root: CommandSpec) {
    const lines: string[] = [];
    for (const spec of flatten(root)) {
        const condition = spec === root ? '__fish_use_subcommand' : `__fish_seen_subcommand_from ${spec.name}`;
        const prefix = `complete -c ${root.name} -n "${condition}"`;
        for (const flag of spec.flags) {
            let line = prefix;
            if (flag.short) line += ` -s ${flag.short.replace(/^-/, '')}`;
            if (flag.long) line += ` -l ${flag.long.replace(/^--/, '')}`;
            line += ` -d ${fishQuote(flag.description)}`;
            if (flag.valueName !== undefined) {
                line += flag.choices.length > 0 ? ` -r -f -a "${flag.choices.join(' ')}"` : ' -r -F';
            }
            lines.push(line);
        }
        for (const sub of spec.subcommands) {
            lines.push(`${prefix} -f -a "${sub.name}" -d ${fishQuote(sub.description)}`);
        }
    }
    return lines;
}

function singleQuote(text: string) {
    return `'${text.replace(/'/g, "''")}'`;
}

function candidates(spec: CommandSpec) {
    return [
        ...spec.flags.flatMap((flag) => flagNames(flag).map((name) => ({ text: name, help: flag.description, flag: true }))),
        ...spec.subcommands.map((sub) => ({ text: sub.name, help: sub.description, flag: false }))
    ];
}

function renderElvish(root: CommandSpec) {
    const lines = [
        'use builtin;',
        'use str;',
        '',
        `set edit:completion:arg-completer[${root.name}] = {|@words|`,
        '    fn cand {|text desc|',
        "        edit:complex-candidate $text &display=$text' '$desc",
        '    }',
        `    var command = ${singleQuote(root.name)}`,
        '    for word $words[1..-1] {',
        "        if (str:has-prefix $word '-') {",
        '            break',
        '        }',
        "        set command = $command';'$word",
        '    }',
        '    var completions = ['
    ];
    for (const spec of flatten(root)) {
        lines.push(`        &${singleQuote(spec.path.join(';'))}= {`);
        for (const candidate of candidates(spec)) {
            lines.push(`            cand ${candidate.text} ${singleQuote(candidate.help)}`);
        }
        lines.push('        }');
    }
    lines.push(
        '    ]',
        '    if (has-key $completions $command) {',
        '        $completions[$command]',
        '    }',
        '}'
    );
    return lines;
}

function renderPowerShell(root: CommandSpec) {
    const lines = [
        'using namespace System.Management.Automation',
        'using namespace System.Management.Automation.Language',
        '',
        `Register-ArgumentCompleter -Native -CommandName ${singleQuote(root.name)} -ScriptBlock {`,
        '    param($wordToComplete, $commandAst, $cursorPosition)',
        '',
        '    $commandElements = $commandAst.CommandElements',
        '    $command = @(',
        `        ${singleQuote(root.name)}`,
        '        for ($i = 1; $i -lt $commandElements.Count; $i++) {',
        '            $element = $commandElements[$i]',
        '            if ($element -isnot [StringConstantExpressionAst] -or',
        '                $element.StringConstantType -ne [StringConstantType]::BareWord -or',
        "                $element.Value.StartsWith('-') -or",
        '                $element.Value -eq $wordToComplete) {',
        '                break',
        '            }',
        '            $element.Value',
        "        }) -join ';'",
        '',
        '    $completions = @(switch ($command) {'
    ];
    for (const spec of flatten(root)) {
        lines.push(`        ${singleQuote(spec.path.join(';'))} {`);
        for (const candidate of candidates(spec)) {
            const kind = candidate.flag ? 'ParameterName' : 'ParameterValue';
            lines.push(
                `            [CompletionResult]::new(${singleQuote(candidate.text)}, ${singleQuote(candidate.text)}, [CompletionResultType]::${kind}, ${singleQuote(candidate.help)})`
            );
        }
        lines.push('            break', '        }');
    }
    lines.push(
        '    })',
        '',
        '    $completions.Where{ $_.CompletionText -like "$wordToComplete*" } |',
        '        Sort-Object -Property ListItemText',
        '}'
    );
    return lines;
}

const renderers: Record<Shell, { file: (name: string) => string; render: (root: CommandSpec) => string[] }> = {
    bash: { file: (name) => `${name}.bash`, render: renderBash },
    zsh: { file: (name) => `_${name}`, render: renderZsh },
    fish: { file: (name) => `${name}.fish`, render: renderFish },
    elvish: { file: (name) => `${name}.elv`, render: renderElvish },
    powershell: { file: (name) => `_${name}.ps1`, render: renderPowerShell }
};

/** Completion script for `shell`, derived from the command tree's own definition. */
export function renderCompletion(root: Command, shell: Shell): { file: string; content: string } {
    const renderer = renderers[shell];
    return {
        file: renderer.file(root.name()),
        content: `${renderer.render(describeTree(root)).join('\n')}\n`
    };
}

export async function writeCompletion(root: Command, outDir: string, shell: Shell): Promise<string> {
    const { file, content } = renderCompletion(root, shell);
    await fs.mkdir(outDir, { recursive: true });
    const target = path.join(outDir, file);
    await fs.writeFile(target, content, 'utf8');
    return target;
}
