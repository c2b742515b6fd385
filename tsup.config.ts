import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry: { index: "src/index.ts" },
    format: ["esm"],
    sourcemap: true,
    dts: true,
    target: "node20",
  },
  {
    entry: { main: "src/main.ts" },
    format: ["esm"],
    sourcemap: true,
    target: "node20",
    // Executable entry for the `workstation-setup` bin
    banner: { js: "#!/usr/bin/env node" },
  },
]);
