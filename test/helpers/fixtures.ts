import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { CORPUS_ARTIFACTS } from "../../src/corpus/layout";

export const silentLogger = pino({ level: "silent" });

export interface NpyOptions {
    descr?: string;
    fortranOrder?: boolean;
    version?: 1 | 2 | 3;
    /** Overrides the shape written to the header. */
    shape?: string;
}

/** Builds a `.npy` file for the given rows, padded the way NumPy pads it. */
export function buildNpy(rows: number[][], options: NpyOptions = {}): Buffer {
    const descr = options.descr ?? "<f4";
    const version = options.version ?? 1;
    const dimension = rows[0]?.length ?? 0;
    const shape = options.shape ?? `(${rows.length}, ${dimension})`;
    const prefixLength = version === 1 ? 10 : 12;

    let header = `{'descr': '${descr}', 'fortran_order': ${options.fortranOrder ? "True" : "False"}, 'shape': ${shape}, }`;
    const padding = 64 - ((prefixLength + header.length + 1) % 64);
    header = `${header}${" ".repeat(padding % 64)}\n`;

    const prefix = Buffer.alloc(prefixLength);
    prefix.set([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59, version, 0]);
    if (version === 1) {
        prefix.writeUInt16LE(header.length, 8);
    } else {
        prefix.writeUInt32LE(header.length, 8);
    }

    const width = descr.endsWith("8") ? 8 : 4;
    const littleEndian = !descr.startsWith(">");
    const values = rows.flat();
    const payload = Buffer.alloc(values.length * width);
    const view = new DataView(payload.buffer, payload.byteOffset, payload.length);
    values.forEach((value, i) => {
        if (width === 4) {
            view.setFloat32(i * 4, value, littleEndian);
        } else {
            view.setFloat64(i * 8, value, littleEndian);
        }
    });

    return Buffer.concat([prefix, Buffer.from(header, "latin1"), payload]);
}

export interface CorpusFixture {
    chunks: string[];
    subchunkTexts?: string[];
    embeddings: number[][];
    parents: unknown[];
}

export interface DialogueFixture extends CorpusFixture {
    labels: Array<string | null>;
}

export interface StoreFixture {
    dialogue: DialogueFixture;
    essay: CorpusFixture;
    interview: CorpusFixture;
}

export const SAMPLE_STORE: StoreFixture = {
    dialogue: {
        chunks: ["gpt one", "opus one", "gpt two"],
        labels: ["gpt3_davinci", "opus_3", "gpt3_turbo"],
        embeddings: [[0.9, 0], [0.1, 0], [0.8, 0], [0.3, 0]],
        parents: [0, 0, 1, { original_chunk_index: 2 }],
    },
    essay: {
        chunks: ["essay a", "essay b"],
        embeddings: [[0.2, 0], [0.6, 0]],
        parents: [{ original_chunk_index: 0 }, { original_chunk_index: 1 }],
    },
    interview: {
        chunks: ["interview a"],
        embeddings: [[0.4, 0]],
        parents: [{ qa_index: 0 }],
    },
};

/** Relative path to file contents for every artifact of the fixture. */
export function corpusFiles(fixture: StoreFixture): Map<string, Buffer> {
    const files = new Map<string, Buffer>();
    const json = (value: unknown) => Buffer.from(JSON.stringify(value), "utf8");

    for (const name of ["dialogue", "essay", "interview"] as const) {
        const corpus = fixture[name];
        const artifacts = CORPUS_ARTIFACTS[name];
        files.set(artifacts.chunks, json(corpus.chunks));
        files.set(artifacts.subchunkTexts, json(corpus.subchunkTexts ?? corpus.embeddings.map((_, i) => `sub ${i}`)));
        files.set(artifacts.embeddings, buildNpy(corpus.embeddings));
        files.set(artifacts.parents, json(corpus.parents));
    }
    files.set(CORPUS_ARTIFACTS.dialogue.labels, json(fixture.dialogue.labels));

    return files;
}

export async function writeCorpus(rootDir: string, files: Map<string, Buffer>): Promise<void> {
    for (const [relativePath, contents] of files) {
        const target = path.join(rootDir, relativePath);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, contents);
    }
}

export async function makeTempDir(prefix = "leilan-test-"): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
