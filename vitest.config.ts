import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["tests/**/*.test.ts"],
        exclude: ["node_modules", "dist"],
        testTimeout: 30000,
        hookTimeout: 30000,
        env: {
            NODE_ENV: "test",
            LOG_LEVEL: "silent",
        },
    },
});
