import { MissingTeardownError } from "../errors";

/** Cómo liberar un T. Lo que en otros lenguajes sería un type class. */
export interface Teardown<T> {
    teardown(resource: T): void;
}

/** Cualquier cosa con un `close()` sincrónico (sockets, handles, clientes, ...). */
export interface Closeable {
    close(): void;
}

export const closeableTeardown: Teardown<Closeable> = {
    teardown: (resource) => resource.close(),
};

export function isCloseable(value: unknown): value is Closeable {
    return (
        typeof value === "object" &&
        value !== null &&
        "close" in value &&
        typeof value.close === "function"
    );
}

// acepta constructores abstractos y con cualquier aridad
export type Constructor<T> = abstract new (...args: never[]) => T;

type Entry = {
    readonly label: string;
    readonly release: (resource: unknown) => void;
};

/**
 * Tabla explícita clase -> Teardown.
 *
 * Se resuelve en el call site (cuando se arma el Managed), no en build():
 * si falta la instancia, el error aparece antes de abrir nada.
 */
export class TeardownRegistry {
    private readonly entries = new Map<unknown, Entry>();

    register<T>(ctor: Constructor<T>, instance: Teardown<T>): this {
        this.entries.set(ctor, {
            label: ctor.name,
            release: (resource) => {
                if (!(resource instanceof ctor)) {
                    throw new TypeError(`Teardown for ${ctor.name} got a value of another type`);
                }
                instance.teardown(resource);
            },
        });
        return this;
    }

    has(ctor: Constructor<unknown>): boolean {
        return this.findEntry(ctor) !== undefined;
    }

    /**
     * Busca la instancia más cercana en la jerarquía de clases.
     * Si no hay ninguna y el prototipo tiene `close()`, usa `closeableTeardown`.
     */
    resolve<T>(ctor: Constructor<T>): Teardown<T> {
        const entry = this.findEntry(ctor);
        if (entry) {
            return { teardown: (resource) => entry.release(resource) };
        }

        const proto: unknown = ctor.prototype;
        if (isCloseable(proto)) {
            return {
                teardown: (resource) => {
                    if (!isCloseable(resource)) {
                        throw new TypeError(`${ctor.name} instance has no close() method`);
                    }
                    closeableTeardown.teardown(resource);
                },
            };
        }

        throw new MissingTeardownError(ctor.name || "<anonymous class>");
    }

    private findEntry(ctor: Constructor<unknown>): Entry | undefined {
        let cur: unknown = ctor;
        while (typeof cur === "function" && cur !== Function.prototype) {
            const entry = this.entries.get(cur);
            if (entry) return entry;
            cur = Object.getPrototypeOf(cur);
        }
        return undefined;
    }
}

/** Registry compartido por el proceso. */
export const defaultTeardownRegistry = new TeardownRegistry();
