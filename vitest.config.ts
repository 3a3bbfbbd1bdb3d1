import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "gauss-jordan-inverter",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
