import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    cli: "src/cli.ts",
    index: "src/index.ts",
  },
  format: ["esm"],
  target: "node20",
  dts: true,
  clean: true,
  shims: true,
  async onSuccess() {
    // CLI entry needs a shebang to run as a bin
    const fs = await import("node:fs");
    const cliPath = "./dist/cli.js";
    const content = fs.readFileSync(cliPath, "utf-8");
    if (!content.startsWith("#!/usr/bin/env node")) {
      fs.writeFileSync(cliPath, `#!/usr/bin/env node\n${content}`);
    }
  },
});
