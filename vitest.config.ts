import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["main.test.ts", "src/**/*.test.ts"],
    },
});
