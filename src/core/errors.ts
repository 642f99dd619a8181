// errors.ts

export const toError = (e: unknown): Error =>
    e instanceof Error ? e : new Error(String(e), { cause: e });

const messageOf = (e: unknown): string =>
    e instanceof Error ? e.message : String(e);

/**
 * Dos fallas de teardown dentro del mismo unwind.
 * `outer` es el último teardown intentado (el link más interno), `inner` el anterior.
 * Cualquiera de los dos puede ser otro TeardownDoubleError, así que anida N fallas.
 */
export class TeardownDoubleError extends Error {
    readonly name = "TeardownDoubleError";

    constructor(
        readonly outer: unknown,
        readonly inner: unknown
    ) {
        super(
            `Double error while tearing down composite resource: ${messageOf(outer)}, ${messageOf(inner)}`,
            { cause: outer }
        );
    }

    /** Aplana el árbol en orden de teardown (más reciente primero). */
    failures(): unknown[] {
        const flat = (e: unknown): unknown[] =>
            e instanceof TeardownDoubleError ? e.failures() : [e];
        return [...flat(this.outer), ...flat(this.inner)];
    }
}

export class MissingTeardownError extends Error {
    readonly name = "MissingTeardownError";

    constructor(readonly typeName: string) {
        super(`No Teardown instance registered for ${typeName} and it has no close() method`);
    }
}

export class ShutdownInProgressError extends Error {
    readonly name = "ShutdownInProgressError";

    constructor() {
        super("Shutdown already in progress: cannot register more hooks");
    }
}

// errores secundarios, indexados por el error primario
const suppressedByPrimary = new WeakMap<object, unknown[]>();

/**
 * Adjunta `secondary` como error suprimido de `primary` y devuelve lo que hay que tirar.
 * Si `primary` no es un objeto (ej: `throw "boom"`) se envuelve en un Error primero.
 */
export function addSuppressed(primary: unknown, secondary: unknown): unknown {
    const target = typeof primary === "object" && primary !== null ? primary : toError(primary);

    const list = suppressedByPrimary.get(target);
    if (list) list.push(secondary);
    else suppressedByPrimary.set(target, [secondary]);

    return target;
}

export function getSuppressed(error: unknown): readonly unknown[] {
    if (typeof error !== "object" || error === null) return [];
    return suppressedByPrimary.get(error) ?? [];
}
