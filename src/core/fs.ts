import { constants } from 'node:fs'
import { access, cp, copyFile, mkdir, mkdtemp, readdir, readFile, realpath, rm, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'

export interface DirEntry {
    name: string
    isDirectory: boolean
}

export interface FileStat {
    isDirectory: boolean
    size: number
    mtimeMs: number
}

export interface FileSystem {
    readText(path: string): Promise<string>
    readBytes(path: string, signal?: AbortSignal): Promise<Uint8Array>
    readJSON<T>(path: string): Promise<T>
    writeText(path: string, content: string): Promise<void>
    writeBytes(path: string, data: Uint8Array): Promise<void>
    writeJSON(path: string, data: unknown): Promise<void>
    exists(path: string): Promise<boolean>
    stat(path: string): Promise<FileStat | null>
    listDir(path: string): Promise<DirEntry[]>
    mkdir(path: string): Promise<void>
    mkdtemp(prefix: string): Promise<string>
    copyFile(from: string, to: string): Promise<void>
    copyDir(from: string, to: string): Promise<void>
    remove(path: string): Promise<void>
    /** Canonical path with symlinks resolved. */
    realpath(path: string): Promise<string>
}

export class NodeFileSystem implements FileSystem {
    async readText(filePath: string): Promise<string> {
        return readFile(filePath, 'utf8')
    }

    async readBytes(filePath: string, signal?: AbortSignal): Promise<Uint8Array> {
        const buffer = await readFile(filePath, { signal })
        return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath)) as T
    }

    async writeText(filePath: string, content: string): Promise<void> {
        await mkdir(path.dirname(filePath), { recursive: true })
        await writeFile(filePath, content, 'utf8')
    }

    async writeBytes(filePath: string, data: Uint8Array): Promise<void> {
        await mkdir(path.dirname(filePath), { recursive: true })
        await writeFile(filePath, data)
    }

    async writeJSON(filePath: string, data: unknown): Promise<void> {
        await this.writeText(filePath, `${JSON.stringify(data, null, 2)}\n`)
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await access(filePath, constants.F_OK)
            return true
        } catch {
            return false
        }
    }

    async stat(filePath: string): Promise<FileStat | null> {
        try {
            const info = await stat(filePath)
            return { isDirectory: info.isDirectory(), size: info.size, mtimeMs: info.mtimeMs }
        } catch {
            return null
        }
    }

    async listDir(dirPath: string): Promise<DirEntry[]> {
        const entries = await readdir(dirPath, { withFileTypes: true })
        return entries.map((e) => ({ name: e.name, isDirectory: e.isDirectory() }))
    }

    async mkdir(dirPath: string): Promise<void> {
        await mkdir(dirPath, { recursive: true })
    }

    async mkdtemp(prefix: string): Promise<string> {
        await mkdir(path.dirname(prefix), { recursive: true })
        return mkdtemp(prefix)
    }

    async copyFile(from: string, to: string): Promise<void> {
        await mkdir(path.dirname(to), { recursive: true })
        await copyFile(from, to)
    }

    async copyDir(from: string, to: string): Promise<void> {
        await cp(from, to, { recursive: true, errorOnExist: false, force: true, preserveTimestamps: true })
    }

    async remove(targetPath: string): Promise<void> {
        await rm(targetPath, { recursive: true, force: true })
    }

    async realpath(targetPath: string): Promise<string> {
        return realpath(targetPath)
    }
}
