import { fileURLToPath } from 'node:url';
import { describe, expect, test } from 'vitest';
import { StructuredError } from '../../engine/src/index.js';
import { loadCommandFile, resolveCommands } from './commandFile.js';

const fixture = (name: string) => fileURLToPath(new URL(`../../test/fixtures/${name}`, import.meta.url));

async function failure(file: string) {
    try {
        await loadCommandFile(file);
    } catch (error) {
        return error;
    }
    throw new Error(`expected ${file} to be rejected`);
}

describe('loadCommandFile', () => {
    test('reads json, yaml and toml command lists', async () => {
        expect(await loadCommandFile(fixture('commands.json'))).toEqual(['echo from-json', "printf 'a b'"]);
        expect(await loadCommandFile(fixture('commands.yaml'))).toEqual(['echo from-yaml']);
        expect(await loadCommandFile(fixture('commands.toml'))).toEqual(['echo from-toml', 'sleep 0']);
    });

    test('reports entries that do not match the schema', async () => {
        const file = fixture('bad-schema.json');
        const error = await failure(file);
        expect(error).toBeInstanceOf(StructuredError);
        expect(error).toMatchObject({ code: 'command_file', message: `${file}: commands.0.command: Required` });
    });

    test('reports unparseable files with their format', async () => {
        const file = fixture('broken.json');
        const error = await failure(file);
        expect(error).toMatchObject({ code: 'command_file' });
        expect(error instanceof Error && error.message.startsWith(`${file}: invalid json: `)).toBe(true);
    });

    test('reports unreadable files', async () => {
        const file = fixture('missing.json');
        const error = await failure(file);
        expect(error).toMatchObject({ code: 'command_file' });
        expect(error instanceof Error && error.message.startsWith(`${file}: ENOENT`)).toBe(true);
    });

    test('rejects unknown extensions before reading', async () => {
        const error = await failure(fixture('commands.txt'));
        expect(error).toMatchObject({ code: 'unsupported_format' });
    });
});

describe('resolveCommands', () => {
    test('puts inline commands first, then files in order', async () => {
        const commands = await resolveCommands(['echo inline'], [fixture('commands.yaml'), fixture('commands.json')]);
        expect(commands).toEqual(['echo inline', 'echo from-yaml', 'echo from-json', "printf 'a b'"]);
    });
});
