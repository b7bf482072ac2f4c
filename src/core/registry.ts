import { ConfigurationError } from './errors.js'

declare const serviceType: unique symbol

/** Typed identifier for a registered service. The type parameter is phantom. */
export interface ServiceKey<T> {
    readonly id: string
    readonly [serviceType]?: T
}

export function serviceKey<T>(id: string): ServiceKey<T> {
    return { id }
}

export interface RegisterOptions {
    /** Replace an existing registration. Test setup only. */
    allowReplace?: boolean
}

/**
 * Explicit key → instance container. Populated once at startup, leaf
 * services first, then sealed; read-only for the rest of the process.
 */
export class ServiceRegistry {
    private entries = new Map<string, unknown>()
    private sealed = false

    register<T>(key: ServiceKey<T>, instance: T, options: RegisterOptions = {}): void {
        const exists = this.entries.has(key.id)
        if (exists && !options.allowReplace) {
            throw new ConfigurationError(`Service '${key.id}' is already registered`)
        }
        if (!exists && this.sealed) {
            throw new ConfigurationError(`Cannot register '${key.id}': the service registry is sealed`)
        }
        this.entries.set(key.id, instance)
    }

    resolve<T>(key: ServiceKey<T>): T {
        if (!this.entries.has(key.id)) {
            throw new ConfigurationError(`Service '${key.id}' is not registered`)
        }
        // only register() writes entries, and it ties key.id to a T
        return this.entries.get(key.id) as T
    }

    has<T>(key: ServiceKey<T>): boolean {
        return this.entries.has(key.id)
    }

    keys(): string[] {
        return [...this.entries.keys()]
    }

    seal(): void {
        this.sealed = true
    }

    get isSealed(): boolean {
        return this.sealed
    }

    reset(): void {
        this.entries.clear()
        this.sealed = false
    }
}
