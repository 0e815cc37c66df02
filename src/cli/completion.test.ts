import { Command, Option } from 'commander';
import { describe, expect, test } from 'vitest';
import { renderCompletion } from './completion.js';

function collect(value: string, previous: string[]) {
    return [...previous, value];
}

function tool() {
    const root = new Command('tool')
        .description('Does things.')
        .option('-e, --eager', 'go early')
        .addOption(new Option('--mode <mode>', "the run's mode").choices(['fast', 'slow']))
        .option('-c, --cmd <cmd>', 'a command', collect, []);
    root.command('sub').description('A [sub] command: nested.').requiredOption('-o, --out <dir>', 'output directory');
    return root;
}

function lines(shell: Parameters<typeof renderCompletion>[1]) {
    return renderCompletion(tool(), shell).content.split('\n');
}

describe('renderCompletion', () => {
    test('names each script the way its shell looks it up', () => {
        expect(renderCompletion(tool(), 'bash').file).toBe('tool.bash');
        expect(renderCompletion(tool(), 'zsh').file).toBe('_tool');
        expect(renderCompletion(tool(), 'fish').file).toBe('tool.fish');
        expect(renderCompletion(tool(), 'elvish').file).toBe('tool.elv');
        expect(renderCompletion(tool(), 'powershell').file).toBe('_tool.ps1');
    });

    test('bash walks subcommands and completes option values', () => {
        const script = lines('bash');
        expect(script[0]).toBe('_tool() {');
        expect(script).toContain('            tool,sub) cmd="tool__sub" ;;');
        expect(script).toContain('                --mode) COMPREPLY=($(compgen -W "fast slow" -- "${cur}")); return 0 ;;');
        expect(script).toContain('                -o|--out) COMPREPLY=($(compgen -f -- "${cur}")); return 0 ;;');
        expect(script).toContain('            COMPREPLY=($(compgen -W "-e --eager --mode -c --cmd -h --help sub" -- "${cur}"))');
        expect(script.at(-2)).toBe('complete -F _tool -o bashdefault -o default tool');
    });

    test('zsh escapes help text and marks repeatable options', () => {
        const script = lines('zsh');
        expect(script[0]).toBe('#compdef tool');
        expect(script).toContain("        '-e[go early]' \\");
        expect(script).toContain("        '--mode=[the run'\\''s mode]:mode:(fast slow)' \\");
        expect(script).toContain("        '*-c+[a command]:cmd:_files' \\");
        expect(script).toContain("        'sub:A [sub] command\\: nested.'");
        expect(script).toContain('                (sub) _tool__sub ;;');
        expect(script).toContain("        '-o+[output directory]:dir:_files' \\");
    });

    test('fish scopes options to their subcommand', () => {
        const script = lines('fish');
        expect(script).toContain(`complete -c tool -n "__fish_use_subcommand" -s e -l eager -d 'go early'`);
        expect(script).toContain(`complete -c tool -n "__fish_use_subcommand" -l mode -d 'the run\\'s mode' -r -f -a "fast slow"`);
        expect(script).toContain(`complete -c tool -n "__fish_use_subcommand" -f -a "sub" -d 'A [sub] command: nested.'`);
        expect(script).toContain(`complete -c tool -n "__fish_seen_subcommand_from sub" -s o -l out -d 'output directory' -r -F`);
    });

    test('elvish and powershell list candidates per command path', () => {
        const elvish = lines('elvish');
        expect(elvish).toContain("        &'tool;sub'= {");
        expect(elvish).toContain("            cand --mode 'the run''s mode'");
        expect(elvish).toContain("            cand sub 'A [sub] command: nested.'");

        const powershell = lines('powershell');
        expect(powershell).toContain("        'tool;sub' {");
        expect(powershell).toContain(
            "            [CompletionResult]::new('--mode', '--mode', [CompletionResultType]::ParameterName, 'the run''s mode')"
        );
        expect(powershell).toContain(
            "            [CompletionResult]::new('sub', 'sub', [CompletionResultType]::ParameterValue, 'A [sub] command: nested.')"
        );
    });
});
