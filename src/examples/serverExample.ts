// src/examples/serverExample.ts
//
// Stack de un "servicio" con health check + api, liberado al recibir SIGINT/SIGTERM.
// Correr con: npm run build && node dist/examples/serverExample.js

import { Managed } from "../core/managed";
import { observe } from "../core/runtime/observe";
import { EventBus } from "../core/runtime/eventBus";
import { consoleJsonLoggerSink } from "../core/runtime/loggerSink";
import { ProcessShutdownHooks } from "../core/runtime/shutdown";
import type { LifecycleHooks } from "../core/runtime/events";

export type Settings = { healthCheckPort: number; apiPort: number };

export class HealthCheckServer {
    ready = false;

    constructor(readonly settings: Settings, private readonly log: (line: string) => void) {
        log(`health check listening on :${settings.healthCheckPort}`);
    }

    markReady() {
        this.ready = true;
        this.log("marked ready");
    }

    markUnready() {
        this.ready = false;
        this.log("marked unready");
    }

    stop() {
        this.log("health check stopped");
    }
}

export class ApiServer {
    constructor(readonly settings: Settings, private readonly log: (line: string) => void) {
        log(`api listening on :${settings.apiPort}`);
    }

    close() {
        this.log("api stopped");
    }
}

export function serverStack(
    log: (line: string) => void,
    hooks: LifecycleHooks
): Managed<ApiServer> {
    return Managed.eval(() => log("starting setup"), () => log("finished teardown"))
        .flatMap(() => Managed.setup((): Settings => ({ healthCheckPort: 8080, apiPort: 7070 })))
        .flatMap((settings) =>
            observe(
                Managed.make(() => new HealthCheckServer(settings, log), (hc) => hc.stop()),
                "health-check",
                hooks
            ).flatMap((healthCheck) =>
                // ApiServer tiene close(): no hace falta pasar el teardown
                observe(Managed.from(() => new ApiServer(settings, log)), "api", hooks).flatMap((api) =>
                    Managed.eval(() => healthCheck.markReady(), () => healthCheck.markUnready())
                        .flatMap(() => Managed.evalSetup(() => log("startup finished")))
                        .map(() => api)
                )
            )
        );
}

function main() {
    const bus = new EventBus();
    bus.subscribe(consoleJsonLoggerSink());

    serverStack((line) => console.log(line), bus).useUntilShutdown({
        shutdownHooks: new ProcessShutdownHooks({ hooks: bus }),
    });

    // mantiene vivo el proceso hasta la señal
    setInterval(() => {}, 60_000);
}

if (require.main === module) {
    main();
}
