import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  target: "node20",
  outDir: "dist",
  // Add shebang for CLI executable
  banner: {
    js: "#!/usr/bin/env node",
  },
  // Workspace packages export TypeScript sources, so they are bundled
  noExternal: [/^@otpkit\//],
});
