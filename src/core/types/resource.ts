/**
 * Un valor vivo + su acción de liberación (one-shot).
 * No se usa mucho directo: normalmente lo produce `Managed.build()`.
 */
export interface Resource<T> {
    get(): T;
    /** Se invoca exactamente una vez. Llamarlo dos veces es error del caller. */
    teardown(): void;
}

const noop = (): void => {};

const unit: Resource<void> = { get: () => undefined, teardown: noop };

export const Resource = {
    make: <T>(value: T, release: (value: T) => void): Resource<T> => ({
        get: () => value,
        teardown: () => release(value),
    }),

    succeed: <T>(value: T): Resource<T> => ({
        get: () => value,
        teardown: noop,
    }),

    unit,
};
