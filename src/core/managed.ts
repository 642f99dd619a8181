// src/core/managed.ts
import { Resource } from "./types/resource";
import { attempt } from "./types/exit";
import { Closeable, closeableTeardown, isCloseable, Teardown } from "./types/teardown";
import { addSuppressed, TeardownDoubleError } from "./errors";
import { processShutdownHooks, ShutdownHooks } from "./runtime/shutdown";

export type ManagedValue<M> = M extends Managed<infer A> ? A : never;

export type UseUntilShutdownOptions = {
    /** Recibe el error de setup. Si no re-tira, no se registra ningún hook. */
    onSetupFailure?: (error: unknown) => void;
    /** Recibe el error del teardown diferido (corre dentro del hook de shutdown). */
    onTeardownFailure?: (error: unknown) => void;
    shutdownHooks?: ShutdownHooks;
};

const rethrow = (error: unknown): never => {
    throw error;
};

const noop = (): void => {};

/**
 * Receta lazy y reusable para producir (y después liberar) un `Resource<T>`.
 *
 * Componer con `flatMap` no ejecuta nada; todo pasa en `build()`.
 * El setup va de afuera hacia adentro y el teardown al revés, aunque algo falle.
 *
 * ```ts
 * const app = Managed.make(() => openDb(), (db) => db.disconnect())
 *     .flatMap((db) => Managed.from(() => new ApiServer(db)))
 *     .flatMap((api) => Managed.eval(() => api.markReady(), () => api.markUnready()).map(() => api));
 *
 * app.useUntilShutdown();
 * ```
 */
export class Managed<T> {
    constructor(private readonly buildResource: () => Resource<T>) {}

    /**
     * Corre el setup de toda la cadena. Cada llamada produce un Resource independiente;
     * si no se usa `use`, el caller tiene que llamar `teardown()` él mismo.
     */
    build(): Resource<T> {
        return this.buildResource();
    }

    flatMap<U>(f: (t: T) => Managed<U>): Managed<U> {
        return new Managed(() => {
            const rt = this.build();
            const ru = buildDownstream(rt, f);

            return {
                get: () => ru.get(),
                teardown: () => {
                    const outer = attempt(() => ru.teardown());
                    if (outer._tag === "Success") {
                        rt.teardown();
                        return;
                    }

                    // el upstream se libera igual, pase lo que pase abajo
                    const inner = attempt(() => rt.teardown());
                    if (inner._tag === "Success") throw outer.error;
                    throw new TeardownDoubleError(outer.error, inner.error);
                },
            };
        });
    }

    map<U>(f: (t: T) => U): Managed<U> {
        return this.flatMap((t) => Managed.succeed(f(t)));
    }

    /**
     * build + f + teardown garantizado.
     * Si fallan f y el teardown, sale el error de f con el del teardown como suprimido.
     */
    use<R>(f: (t: T) => R): R {
        const resource = this.build();

        const result = attempt(() => f(resource.get()));
        const released = attempt(() => resource.teardown());

        if (result._tag === "Failure") {
            if (released._tag === "Failure") throw addSuppressed(result.error, released.error);
            throw result.error;
        }
        if (released._tag === "Failure") throw released.error;

        return result.value;
    }

    foreach(f: (t: T) => void): void {
        this.use(f);
    }

    run(this: Managed<void>): void {
        this.use(noop);
    }

    /**
     * Arma el stack y deja el teardown colgado de un hook de shutdown del proceso.
     * Pensado para programas que corren "hasta que los paren".
     */
    useUntilShutdown(options: UseUntilShutdownOptions = {}): void {
        const onSetupFailure = options.onSetupFailure ?? rethrow;
        const onTeardownFailure = options.onTeardownFailure ?? rethrow;

        const built = attempt(() => this.build());
        if (built._tag === "Failure") {
            onSetupFailure(built.error);
            // sin resource no hay nada que registrar
            return;
        }

        const resource = built.value;
        const hooks = options.shutdownHooks ?? processShutdownHooks();

        const registered = attempt(() =>
            hooks.register(() => {
                const released = attempt(() => resource.teardown());
                if (released._tag === "Failure") onTeardownFailure(released.error);
            })
        );
        if (registered._tag === "Failure") {
            // sin hook nadie lo va a liberar: se libera acá y sale el error de registro
            const released = attempt(() => resource.teardown());
            if (released._tag === "Failure") throw addSuppressed(registered.error, released.error);
            throw registered.error;
        }
    }

    // ---------------------------------------------------------------------
    // constructores
    // ---------------------------------------------------------------------

    /** Envuelve un Resource existente: todos los build() devuelven el mismo. */
    static fromResource<T>(resource: Resource<T>): Managed<T> {
        return new Managed(() => resource);
    }

    /** Sin setup ni teardown. */
    static succeed<T>(value: T): Managed<T> {
        return Managed.fromResource(Resource.succeed(value));
    }

    static make<T>(setup: () => T, teardown: (t: T) => void): Managed<T> {
        return new Managed(() => Resource.make(setup(), teardown));
    }

    /** Teardown resuelto por capability: `close()` por defecto, o la instancia que se pase. */
    static from<T extends Closeable>(setup: () => T): Managed<T>;
    static from<T>(setup: () => T, instance: Teardown<T>): Managed<T>;
    static from<T>(setup: () => T, instance?: Teardown<T>): Managed<T> {
        if (instance) return Managed.make(setup, (t) => instance.teardown(t));
        return Managed.make(setup, (t) => closeableTeardown.teardown(asCloseable(t)));
    }

    static setup<T>(setup: () => T): Managed<T> {
        return Managed.make(setup, noop);
    }

    static evalSetup(run: () => void): Managed<void> {
        return Managed.make(run, noop);
    }

    static evalTeardown(run: () => void): Managed<void> {
        return Managed.make(noop, run);
    }

    static eval(setupRun: () => void, teardownRun: () => void): Managed<void> {
        return Managed.make(setupRun, teardownRun);
    }

    /**
     * Colección de Managed -> Managed de la colección, respetando la forma
     * (tupla/array, Set, Map). Setup en orden de iteración, teardown al revés.
     */
    static sequence<Ms extends readonly Managed<unknown>[]>(
        managed: readonly [...Ms]
    ): Managed<{ -readonly [K in keyof Ms]: ManagedValue<Ms[K]> }>;
    static sequence<A>(managed: ReadonlySet<Managed<A>>): Managed<Set<A>>;
    static sequence<K, A>(managed: ReadonlyMap<K, Managed<A>>): Managed<Map<K, A>>;
    static sequence<A>(managed: Iterable<Managed<A>>): Managed<A[]>;
    static sequence(
        managed: Iterable<Managed<unknown>> | ReadonlyMap<unknown, Managed<unknown>>
    ): Managed<unknown> {
        if (isMap(managed)) {
            const entries = Array.from(managed, ([k, m]) => m.map((v): [unknown, unknown] => [k, v]));
            return collect(entries).map((pairs) => new Map(pairs));
        }
        if (isSet(managed)) {
            return collect(managed).map((values) => new Set(values));
        }
        return collect(managed);
    }
}

// -------------------------------------------------------------------------
// helpers internos
// -------------------------------------------------------------------------

function buildDownstream<T, U>(rt: Resource<T>, f: (t: T) => Managed<U>): Resource<U> {
    try {
        return f(rt.get()).build();
    } catch (setupError) {
        // no dejar colgado el upstream; el error de setup sigue siendo el principal
        const released = attempt(() => rt.teardown());
        if (released._tag === "Failure") throw addSuppressed(setupError, released.error);
        throw setupError;
    }
}

function collect<A>(managed: Iterable<Managed<A>>): Managed<A[]> {
    // un array nuevo por build
    let acc = Managed.setup((): A[] => []);
    for (const m of managed) {
        acc = acc.flatMap((values) => m.map((a) => [...values, a]));
    }
    return acc;
}

function asCloseable(value: unknown): Closeable {
    if (isCloseable(value)) return value;
    throw new TypeError("Managed.from: resource has no close() method and no Teardown instance was given");
}

function isMap(
    managed: Iterable<Managed<unknown>> | ReadonlyMap<unknown, Managed<unknown>>
): managed is ReadonlyMap<unknown, Managed<unknown>> {
    return managed instanceof Map;
}

function isSet(managed: Iterable<Managed<unknown>>): managed is ReadonlySet<Managed<unknown>> {
    return managed instanceof Set;
}
