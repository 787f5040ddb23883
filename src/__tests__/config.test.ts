import { describe, it, expect } from "vitest";
import fs from "fs";
import path from "path";

const ROOT = path.resolve(__dirname, "../..");

describe("Project configuration", () => {
  it("next.config.ts has static export output", () => {
    const config = fs.readFileSync(
      path.join(ROOT, "next.config.ts"),
      "utf-8"
    );
    expect(config).toContain('output: "export"');
  });

  it("tsconfig.json has strict mode enabled", () => {
    const tsconfig = JSON.parse(
      fs.readFileSync(path.join(ROOT, "tsconfig.json"), "utf-8")
    );
    expect(tsconfig.compilerOptions.strict).toBe(true);
  });

  it("tsconfig.json has path alias @/* configured", () => {
    const tsconfig = JSON.parse(
      fs.readFileSync(path.join(ROOT, "tsconfig.json"), "utf-8")
    );
    expect(tsconfig.compilerOptions.paths["@/*"]).toEqual(["./src/*"]);
  });

  it("package.json uses npm (no yarn.lock or pnpm-lock.yaml)", () => {
    expect(fs.existsSync(path.join(ROOT, "yarn.lock"))).toBe(false);
    expect(fs.existsSync(path.join(ROOT, "pnpm-lock.yaml"))).toBe(false);
  });

  it("package.json runs the tests once with vitest", () => {
    const pkg = JSON.parse(
      fs.readFileSync(path.join(ROOT, "package.json"), "utf-8")
    );
    expect(pkg.scripts.test).toBe("vitest run");
  });

  it("globals.css imports tailwindcss", () => {
    const css = fs.readFileSync(
      path.join(ROOT, "src/styles/globals.css"),
      "utf-8"
    );
    expect(css).toContain("@import \"tailwindcss\"");
  });
});
