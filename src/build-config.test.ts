import fs from "node:fs";
import { describe, expect, it } from "vitest";

function readJson(relative: string): unknown {
  return JSON.parse(fs.readFileSync(new URL(relative, import.meta.url), "utf-8"));
}

describe("build configuration", () => {
  it("emits sources to dist without the tests", () => {
    expect(readJson("../package.json")).toMatchObject({
      scripts: { build: "tsc -p tsconfig.build.json", typecheck: "tsc --noEmit" },
    });
    expect(readJson("../tsconfig.build.json")).toEqual({
      extends: "./tsconfig.json",
      compilerOptions: { noEmit: false, rootDir: "src", outDir: "dist", declaration: true },
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts"],
    });
  });
});
