import path from 'node:path'
import type { Vec3 } from '../case/manifest.js'
import { DecodeError } from '../core/errors.js'
import type { Decoder } from './async-loader.js'

const HEADER_BYTES = 80
const TRIANGLE_BYTES = 50
const YIELD_EVERY = 10_000

export interface Bounds {
    min: Vec3
    max: Vec3
}

export interface StlMesh {
    name: string
    format: 'binary' | 'ascii'
    triangleCount: number
    /** Nine floats per triangle. */
    positions: Float32Array
    bounds: Bounds
    center: Vec3
}

function yieldToLoop(signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        setImmediate(() => {
            if (signal.aborted) reject(new DOMException('STL decode aborted', 'AbortError'))
            else resolve()
        })
    })
}

function computeBounds(positions: Float32Array): Bounds {
    let [minX, minY, minZ] = [Infinity, Infinity, Infinity]
    let [maxX, maxY, maxZ] = [-Infinity, -Infinity, -Infinity]
    for (let i = 0; i + 2 < positions.length; i += 3) {
        const x = positions[i] ?? 0
        const y = positions[i + 1] ?? 0
        const z = positions[i + 2] ?? 0
        minX = Math.min(minX, x)
        minY = Math.min(minY, y)
        minZ = Math.min(minZ, z)
        maxX = Math.max(maxX, x)
        maxY = Math.max(maxY, y)
        maxZ = Math.max(maxZ, z)
    }
    return { min: [minX, minY, minZ], max: [maxX, maxY, maxZ] }
}

function centerOf({ min, max }: Bounds): Vec3 {
    return [(min[0] + max[0]) / 2, (min[1] + max[1]) / 2, (min[2] + max[2]) / 2]
}

function looksAscii(bytes: Uint8Array): boolean {
    const head = new TextDecoder().decode(bytes.subarray(0, Math.min(bytes.length, 512)))
    return /^\s*solid\b/.test(head) && /\bfacet\b/.test(head)
}

async function decodeBinary(bytes: Uint8Array, resourcePath: string, signal: AbortSignal): Promise<Float32Array> {
    if (bytes.byteLength < HEADER_BYTES + 4) {
        throw new DecodeError(resourcePath, `truncated header (${bytes.byteLength} bytes)`)
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    const count = view.getUint32(HEADER_BYTES, true)
    const expected = HEADER_BYTES + 4 + count * TRIANGLE_BYTES
    if (bytes.byteLength < expected) {
        throw new DecodeError(resourcePath, `truncated: ${count} triangles need ${expected} bytes, got ${bytes.byteLength}`)
    }

    const positions = new Float32Array(count * 9)
    for (let t = 0; t < count; t++) {
        // skip the 12-byte facet normal
        const base = HEADER_BYTES + 4 + t * TRIANGLE_BYTES + 12
        for (let k = 0; k < 9; k++) {
            positions[t * 9 + k] = view.getFloat32(base + k * 4, true)
        }
        if (t > 0 && t % YIELD_EVERY === 0) await yieldToLoop(signal)
    }
    return positions
}

async function decodeAscii(text: string, resourcePath: string, signal: AbortSignal): Promise<Float32Array> {
    const values: number[] = []
    const vertex = /^\s*vertex\s+(\S+)\s+(\S+)\s+(\S+)\s*$/
    const lines = text.split(/\r?\n/)
    for (const [index, line] of lines.entries()) {
        if (!line.trimStart().startsWith('vertex')) continue
        const match = vertex.exec(line)
        const coords = match ? [match[1], match[2], match[3]].map(Number) : []
        if (coords.length !== 3 || coords.some((c) => !Number.isFinite(c))) {
            throw new DecodeError(resourcePath, `malformed vertex on line ${index + 1}`)
        }
        values.push(...coords)
        if (values.length % (YIELD_EVERY * 9) === 0) await yieldToLoop(signal)
    }
    if (values.length % 9 !== 0) {
        throw new DecodeError(resourcePath, 'vertex count is not a multiple of three')
    }
    return Float32Array.from(values)
}

/**
 * Binary and ASCII STL. Decoding yields to the event loop every few thousand
 * triangles and stops once the load is cancelled.
 */
export const stlDecoder: Decoder<StlMesh> = {
    name: 'stl',
    async decode(bytes, resourcePath, signal) {
        const ascii = looksAscii(bytes)
        let name = path.basename(resourcePath, path.extname(resourcePath))
        let positions: Float32Array
        if (ascii) {
            const text = new TextDecoder().decode(bytes)
            const solidName = /^\s*solid[ \t]+(\S+)/.exec(text)?.[1]
            if (solidName) name = solidName
            positions = await decodeAscii(text, resourcePath, signal)
        } else {
            positions = await decodeBinary(bytes, resourcePath, signal)
        }

        const triangleCount = positions.length / 9
        if (triangleCount === 0) {
            throw new DecodeError(resourcePath, 'no triangles')
        }
        const bounds = computeBounds(positions)
        return { name, format: ascii ? 'ascii' : 'binary', triangleCount, positions, bounds, center: centerOf(bounds) }
    },
}
