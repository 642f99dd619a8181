import type { LifecycleEmitContext, LifecycleEvent, LifecycleEventRecord, LifecycleHooks } from "./events";

export type EventHandler = (ev: LifecycleEventRecord) => void;

type Subscriber = {
  handler: EventHandler;
  // cola por subscriber (un sink lento no frena a los demás)
  q: LifecycleEventRecord[];
  capacity: number;
  dropped: number;
  failed: number;
  lastError?: unknown;
};

const now = () => (typeof performance !== "undefined" ? performance.now() : Date.now());

export class EventBus implements LifecycleHooks {
  private seq = 1;
  private subs: Subscriber[] = [];
  private flushScheduled = false;

  emit(ev: LifecycleEvent, ctx: LifecycleEmitContext) {
    const full: LifecycleEventRecord = {
      ...ev,
      ...ctx,
      seq: this.seq++,
      ts: now(),
      wallTs: Date.now(),
    };

    for (const s of this.subs) {
      if (s.q.length >= s.capacity) s.dropped++;
      else s.q.push(full);
    }

    // drenar asap (microtask) sin bloquear emit
    if (!this.flushScheduled) {
      this.flushScheduled = true;
      queueMicrotask(() => this.flush());
    }
  }

  subscribe(handler: EventHandler, perSubscriberCapacity = 2048) {
    this.subs.push({
      handler,
      q: [],
      capacity: perSubscriberCapacity,
      dropped: 0,
      failed: 0,
    });

    return () => {
      this.subs = this.subs.filter((s) => s.handler !== handler);
    };
  }

  flush(budget = 4096) {
    this.flushScheduled = false;

    for (const s of this.subs) {
      if (s.dropped > 0) {
        this.deliver(s, this.warning("eventbus.dropped", { dropped: s.dropped }));
        s.dropped = 0;
      }

      let n = 0;
      while (n++ < budget) {
        const ev = s.q.shift();
        if (!ev) break;
        this.deliver(s, ev);
      }

      // un handler que tira no corta el drenado; se avisa en el próximo flush
      if (s.failed > 0) {
        const failed = s.failed;
        const error = s.lastError;
        s.failed = 0;
        s.lastError = undefined;
        s.q.push(this.warning("eventbus.handler_failed", { failed, error }));
        if (!this.flushScheduled) {
          this.flushScheduled = true;
          queueMicrotask(() => this.flush());
        }
      }
    }
  }

  private deliver(s: Subscriber, ev: LifecycleEventRecord) {
    try {
      s.handler(ev);
    } catch (e) {
      // los avisos propios (seq 0) que fallan no generan otro aviso
      if (ev.seq === 0) return;
      s.failed++;
      s.lastError = e;
    }
  }

  private warning(message: string, fields: Record<string, unknown>): LifecycleEventRecord {
    return {
      seq: 0,
      ts: now(),
      wallTs: Date.now(),
      type: "log",
      level: "warn",
      message,
      fields,
    };
  }
}
