import { defineConfig } from "tsup";

// bundle publicable (esm + cjs); `npm run build` sigue siendo tsc a secas
export default defineConfig({
    entry: ["src/index.ts"],
    format: ["esm", "cjs"],
    dts: true,                 // genera .d.ts
    sourcemap: false,
    treeshake: true,
    clean: true,
    outDir: "dist/bundle",
    target: "es2022"
});
