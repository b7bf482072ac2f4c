import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'
import { DecodeError } from '../../../src/core/errors.js'
import { stlDecoder } from '../../../src/loader/stl.js'
import { binaryStl, UNIT_TRIANGLES, type Triangle } from '../../helpers/case-fixtures.js'

const fixtures = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'fixtures')

const decode = (bytes: Uint8Array, name = '/cases/part.stl', signal = new AbortController().signal) =>
    Promise.resolve(stlDecoder.decode(bytes, name, signal))

describe('stlDecoder', () => {
    it('decodes binary STL', async () => {
        const mesh = await decode(binaryStl(UNIT_TRIANGLES))

        expect(mesh.format).toBe('binary')
        expect(mesh.name).toBe('part')
        expect(mesh.triangleCount).toBe(2)
        expect(Array.from(mesh.positions.slice(0, 9))).toEqual([0, 0, 0, 2, 0, 0, 0, 4, 0])
        expect(mesh.bounds).toEqual({ min: [0, 0, 0], max: [2, 4, 6] })
        expect(mesh.center).toEqual([1, 2, 3])
    })

    it('decodes ASCII STL and takes the solid name', async () => {
        const bytes = new Uint8Array(await readFile(path.join(fixtures, 'bracket.stl')))
        const mesh = await decode(bytes)

        expect(mesh.format).toBe('ascii')
        expect(mesh.name).toBe('bracket')
        expect(mesh.triangleCount).toBe(2)
        expect(mesh.bounds).toEqual({ min: [-1, -2, 0], max: [3, 4, 2] })
        expect(mesh.center).toEqual([1, 1, 1])
    })

    it('rejects a truncated binary body', async () => {
        const bytes = binaryStl(UNIT_TRIANGLES, 3)
        await expect(decode(bytes)).rejects.toThrow('truncated: 3 triangles need 234 bytes, got 184')
    })

    it('rejects a file shorter than the header', async () => {
        await expect(decode(new Uint8Array(20))).rejects.toBeInstanceOf(DecodeError)
    })

    it('rejects an empty mesh', async () => {
        await expect(decode(binaryStl([]))).rejects.toThrow('no triangles')
    })

    it('rejects malformed ASCII vertices', async () => {
        const text = 'solid bad\nfacet normal 0 0 1\nouter loop\nvertex 1 2\nendloop\nendfacet\nendsolid bad\n'
        await expect(decode(new TextEncoder().encode(text))).rejects.toThrow('malformed vertex on line 4')
    })

    it('rejects an incomplete ASCII triangle', async () => {
        const text = 'solid bad\nfacet normal 0 0 1\nvertex 0 0 0\nvertex 1 0 0\nendfacet\nendsolid bad\n'
        await expect(decode(new TextEncoder().encode(text))).rejects.toThrow('not a multiple of three')
    })

    it('stops at the next yield once aborted', async () => {
        const triangles: Triangle[] = Array.from({ length: 10_001 }, () => UNIT_TRIANGLES[0] ?? [0, 0, 0, 0, 0, 0, 0, 0, 0])
        const controller = new AbortController()
        controller.abort()
        await expect(decode(binaryStl(triangles), '/big.stl', controller.signal)).rejects.toThrow('STL decode aborted')
    })
})
