import { LifecycleRegistry } from "./registry";

export function dumpResources(reg: LifecycleRegistry): string {
    const resources = Array.from(reg.resources.values());
    resources.sort((a, b) => a.resourceId - b.resourceId);

    const lines: string[] = [];
    lines.push(`=== Resource Dump (${new Date().toISOString()}) ===`);
    for (const r of resources) {
        lines.push(
            `resource#${r.resourceId} ${r.label} state=${r.state} built=${new Date(r.builtAt).toISOString()}` +
            ` released=${r.releasedAt !== undefined ? new Date(r.releasedAt).toISOString() : "-"}`
        );
        if (r.error) lines.push(`  error: ${r.error}`);
    }

    lines.push(`=== Recent Events ===`);
    for (const ev of reg.getRecentEvents().slice(-80)) {
        lines.push(
            `${ev.seq} ${new Date(ev.wallTs).toISOString()} ${ev.type} resource=${ev.resourceId ?? "-"} hook=${ev.hookId ?? "-"}`
        );
    }
    return lines.join("\n");
}
