export type Exit<E, A> =
    | { readonly _tag: "Success"; readonly value: A }
    | { readonly _tag: "Failure"; readonly error: E };

export const Exit = {
    succeed: <E = never, A = never>(value: A): Exit<E, A> => ({
        _tag: "Success",
        value,
    }),

    fail: <E = never, A = never>(error: E): Exit<E, A> => ({
        _tag: "Failure",
        error,
    }),
};

/**
 * Corre un thunk sincrónico y captura lo que tire.
 * En JS se puede tirar cualquier cosa, por eso el error es `unknown`.
 */
export function attempt<A>(thunk: () => A): Exit<unknown, A> {
    try {
        return Exit.succeed(thunk());
    } catch (e) {
        return Exit.fail(e);
    }
}
