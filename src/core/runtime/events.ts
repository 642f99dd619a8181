export type LifecycleStatus = "success" | "failure";

export type LifecycleEvent =
  | {
      type: "resource.setup";
      label: string;
      status: LifecycleStatus;
      error?: unknown;
    }
  | {
      type: "resource.teardown";
      label: string;
      status: LifecycleStatus;
      error?: unknown;
    }
  | {
      type: "shutdown.start";
      reason: string;
      hooks: number;
    }
  | {
      type: "shutdown.hook";
      status: LifecycleStatus;
      error?: unknown;
    }
  | {
      type: "log";
      level: "debug" | "info" | "warn" | "error";
      message: string;
      fields?: Record<string, unknown>;
    };

export type LifecycleEmitContext = {
  resourceId?: number;
  hookId?: number;
};

export interface LifecycleHooks {
  emit(ev: LifecycleEvent, ctx: LifecycleEmitContext): void;
}

export const noopHooks: LifecycleHooks = {
  emit() {},
};

export type LifecycleEventRecord = LifecycleEvent &
  LifecycleEmitContext & {
    seq: number;
    wallTs: number; // Date.now()
    ts: number; // performance.now(), monotónico
  };
