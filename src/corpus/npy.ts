import type { EmbeddingMatrix } from "./types";

const NPY_MAGIC = Buffer.from([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]);
const FLOAT_DESCR = /^([<>=|])f([48])$/;

function readHeaderField(header: string, field: string, pattern: string): string {
    const match = new RegExp(`'${field}'\\s*:\\s*${pattern}`).exec(header);
    if (!match) {
        throw new Error(`NumPy header is missing "${field}".`);
    }
    return match[1];
}

/**
 * Decodes a 2-D float32/float64 `.npy` array (format versions 1 to 3) into
 * a row-major float32 matrix.
 */
export function parseNpy(buffer: Buffer): EmbeddingMatrix {
    if (buffer.length < 10 || !buffer.subarray(0, NPY_MAGIC.length).equals(NPY_MAGIC)) {
        throw new Error("File is not a NumPy .npy array.");
    }

    const major = buffer[6];
    if (major < 1 || major > 3) {
        throw new Error(`Unsupported .npy format version ${major}.`);
    }

    const headerStart = major === 1 ? 10 : 12;
    if (buffer.length < headerStart) {
        throw new Error("Truncated .npy header.");
    }
    const headerLength = major === 1 ? buffer.readUInt16LE(8) : buffer.readUInt32LE(8);
    const dataOffset = headerStart + headerLength;
    if (dataOffset > buffer.length) {
        throw new Error("Truncated .npy header.");
    }

    const header = buffer.toString(major === 3 ? "utf8" : "latin1", headerStart, dataOffset);
    const descr = readHeaderField(header, "descr", "'([^']+)'");
    const fortranOrder = readHeaderField(header, "fortran_order", "(True|False)");
    const shape = readHeaderField(header, "shape", "\\(([^)]*)\\)")
        .split(",")
        .map((part) => part.trim())
        .filter(Boolean)
        .map(Number);

    const dtype = FLOAT_DESCR.exec(descr);
    if (!dtype) {
        throw new Error(`Unsupported .npy dtype "${descr}"; expected float32 or float64.`);
    }
    if (fortranOrder === "True") {
        throw new Error("Fortran-ordered .npy arrays are not supported.");
    }
    if (shape.length !== 2 || shape.some((size) => !Number.isInteger(size) || size < 0)) {
        throw new Error(`Expected a 2-D .npy array, got shape (${shape.join(", ")}).`);
    }

    const [rows, dimension] = shape;
    const littleEndian = dtype[1] !== ">";
    const width = Number(dtype[2]);
    const count = rows * dimension;
    if (buffer.length - dataOffset < count * width) {
        throw new Error(`.npy payload holds fewer than ${count} values.`);
    }

    const view = new DataView(buffer.buffer, buffer.byteOffset + dataOffset, count * width);
    const data = new Float32Array(count);
    for (let i = 0; i < count; i += 1) {
        data[i] = width === 4 ? view.getFloat32(i * 4, littleEndian) : view.getFloat64(i * 8, littleEndian);
    }

    return { rows, dimension, data };
}
