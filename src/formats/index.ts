import path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { StructuredError } from '../../engine/src/index.js';

/** Reads command-list files. */
export interface Codec {
    name: string;
    extensions: readonly string[];
    parse(text: string): unknown;
}

/** A codec that can also write the run result. */
export interface OutputCodec extends Codec {
    name: OutputFormat;
    stringify(value: unknown): string;
}

/** Formats accepted by `--stdout`. */
export const OUTPUT_FORMATS = ['json', 'yaml'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const json: OutputCodec = {
    name: 'json',
    extensions: ['.json'],
    parse: (text) => JSON.parse(text),
    stringify: (value) => `${JSON.stringify(value, null, 2)}\n`
};

const yaml: OutputCodec = {
    name: 'yaml',
    extensions: ['.yaml', '.yml'],
    parse: (text) => parseYaml(text),
    stringify: (value) => stringifyYaml(value)
};

// input only: TOML has no null and cannot hold an array at the top level
const toml: Codec = {
    name: 'toml',
    extensions: ['.toml'],
    parse: (text) => parseToml(text)
};

const outputCodecs: Record<OutputFormat, OutputCodec> = { json, yaml };
const codecs: readonly Codec[] = [json, yaml, toml];

export function supportedExtensions() {
    return codecs.flatMap((codec) => codec.extensions);
}

export function codecForPath(file: string): Codec {
    const ext = path.extname(file).toLowerCase();
    const codec = codecs.find((candidate) => candidate.extensions.includes(ext));
    if (!codec) {
        throw new StructuredError(
            'unsupported_format',
            `${file}: unsupported command file extension '${ext || '(none)'}' (expected one of ${supportedExtensions().join(', ')})`
        );
    }
    return codec;
}

export function codecByName(name: OutputFormat): OutputCodec {
    return outputCodecs[name];
}
