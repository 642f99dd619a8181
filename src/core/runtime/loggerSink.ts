import type { LifecycleEventRecord } from "./events";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LineWriter = (level: LogLevel, line: string) => void;

const consoleWriter: LineWriter = (level, line) => {
    // en prod querés stdout/stderr
    if (level === "error") console.error(line);
    else console.log(line);
};

const errorFields = (e: unknown) =>
    e instanceof Error ? { error: e.message, errorName: e.name } : { error: String(e) };

/**
 * Sink de una línea JSON por evento: los `log` y los resource/hook que fallaron.
 * Los éxitos se ignoran (para eso está el registry).
 */
export function consoleJsonLoggerSink(write: LineWriter = consoleWriter) {
    return (ev: LifecycleEventRecord) => {
        const base = {
            wallTs: ev.wallTs,
            seq: ev.seq,
            resourceId: ev.resourceId,
            hookId: ev.hookId,
        };

        switch (ev.type) {
            case "log":
                write(ev.level, JSON.stringify({ level: ev.level, msg: ev.message, ...base, ...ev.fields }));
                return;
            case "resource.setup":
            case "resource.teardown":
                if (ev.status === "success") return;
                write("error", JSON.stringify({ level: "error", msg: `${ev.type}.failed`, label: ev.label, ...base, ...errorFields(ev.error) }));
                return;
            case "shutdown.hook":
                if (ev.status === "success") return;
                write("error", JSON.stringify({ level: "error", msg: "shutdown.hook.failed", ...base, ...errorFields(ev.error) }));
                return;
            case "shutdown.start":
                write("info", JSON.stringify({ level: "info", msg: "shutdown.start", reason: ev.reason, hooks: ev.hooks, ...base }));
                return;
        }
    };
}
