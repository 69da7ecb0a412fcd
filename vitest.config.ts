import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["src/tests/**/*.test.ts"],
        setupFiles: ["src/tests/setup.ts"],
        testTimeout: 10_000,
    },
});
