import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    resolve: {
        alias: [{ find: /^#\/(.*)$/, replacement: path.join(root, "src/$1") }],
    },
    test: {
        include: ["src/**/*.test.ts"],
        setupFiles: ["./vitest.setup.ts"],
    },
});
