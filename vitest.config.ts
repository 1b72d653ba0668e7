import swc from "unplugin-swc";
import { defineConfig } from "vitest/config";

export default defineConfig({
  // esbuild drops decorator metadata; swc emits design:paramtypes for the DI container.
  plugins: [
    swc.vite({
      jsc: {
        parser: { syntax: "typescript", decorators: true },
        transform: { legacyDecorator: true, decoratorMetadata: true },
        target: "es2022",
      },
      module: { type: "es6" },
    }),
  ],
  test: {
    include: ["packages/*/tests/**/*.test.ts", "samples/*/tests/**/*.test.ts"],
    environment: "node",
  },
});
