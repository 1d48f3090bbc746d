import { defineConfig } from "vitest/config"

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        watch: false,
        include: ["src/**/*.test.ts"],
        testTimeout: 30_000,
        coverage: {
            provider: "v8",
            reporter: ["text", "json", "html"],
            exclude: ["node_modules/", "src/**/*.test.ts", "dist/"],
        },
    },
})
