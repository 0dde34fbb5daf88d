import { defineConfig } from "tsup";

export default defineConfig({
    entry: ["src/index.ts", "src/cli.ts"],
    format: ["cjs"],
    dts: true,                 // genera .d.ts
    sourcemap: false,
    minify: false,             // el cli se lee en stack traces
    treeshake: true,
    clean: true,               // borra dist
    outDir: "dist",
    target: "node20"
});
