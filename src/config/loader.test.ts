import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CONFIG_ENV_VAR, expandHomePath, loadConfig, loadConfigOrDefaults, resolveConfigPath } from "./loader";

const ENV_KEY = "MEDIA_SELECT_LOADER_TEST_FFMPEG";
const tempDirs: string[] = [];

function writeConfig(contents: string): { dir: string; configPath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "media-select-loader-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.jsonc");
  fs.writeFileSync(configPath, contents, "utf-8");
  return { dir, configPath };
}

afterEach(() => {
  vi.unstubAllEnvs();
  delete process.env[ENV_KEY];
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("resolveConfigPath", () => {
  it("prefers an explicit path, then the environment, then the home default", () => {
    vi.stubEnv(CONFIG_ENV_VAR, "/etc/media-select.jsonc");
    expect(resolveConfigPath("/tmp/custom.jsonc")).toBe("/tmp/custom.jsonc");
    expect(resolveConfigPath()).toBe("/etc/media-select.jsonc");
    vi.stubEnv(CONFIG_ENV_VAR, "");
    expect(resolveConfigPath()).toBe(path.join(os.homedir(), ".media-select", "config.jsonc"));
  });
});

describe("expandHomePath", () => {
  it("expands a leading tilde only", () => {
    expect(expandHomePath("~")).toBe(os.homedir());
    expect(expandHomePath("~/Pictures")).toBe(path.join(os.homedir(), "Pictures"));
    expect(expandHomePath("/srv/~/x")).toBe("/srv/~/x");
  });
});

describe("loadConfig", () => {
  it("parses JSONC with comments", () => {
    const { configPath } = writeConfig(`{
      // where generated paths start
      "storage": { "folderPath": "uploads" },
      "image": { "maxWidth": 1024, "imageQuality": 80 } /* scaled down */
    }`);

    const result = loadConfig(configPath);

    expect(result).toEqual({
      success: true,
      path: configPath,
      config: {
        storage: { folderPath: "uploads" },
        image: { maxWidth: 1024, imageQuality: 80 },
        logging: { level: "info" },
      },
    });
  });

  it("expands ~ in gallery and storage paths", () => {
    const { configPath } = writeConfig(
      JSON.stringify({ gallery: { dir: "~/Pictures" }, storage: { folderPath: "~/out" } }),
    );
    const result = loadConfig(configPath);
    expect(result.config?.gallery?.dir).toBe(path.join(os.homedir(), "Pictures"));
    expect(result.config?.storage?.folderPath).toBe(path.join(os.homedir(), "out"));
  });

  it("fills env placeholders from the config-local .env", () => {
    const { dir, configPath } = writeConfig(
      JSON.stringify({ ffmpeg: { binPath: `\${${ENV_KEY}}` } }),
    );
    fs.writeFileSync(path.join(dir, ".env"), `${ENV_KEY}=/opt/ffmpeg/bin/ffmpeg\n`, "utf-8");

    const result = loadConfig(configPath);

    expect(result.config?.ffmpeg?.binPath).toBe("/opt/ffmpeg/bin/ffmpeg");
  });

  it("does not override the process environment with the .env file", () => {
    process.env[ENV_KEY] = "/usr/local/bin/ffmpeg";
    const { dir, configPath } = writeConfig(
      JSON.stringify({ ffmpeg: { binPath: `\${${ENV_KEY}}` } }),
    );
    fs.writeFileSync(path.join(dir, ".env"), `${ENV_KEY}=/opt/ffmpeg/bin/ffmpeg\n`, "utf-8");

    expect(loadConfig(configPath).config?.ffmpeg?.binPath).toBe("/usr/local/bin/ffmpeg");
  });

  it("requires a camera device when camera support is forced on", () => {
    const { configPath } = writeConfig(JSON.stringify({ platform: { supportsCamera: true } }));
    expect(loadConfig(configPath)).toEqual({
      success: false,
      path: configPath,
      errors: ["camera.device: camera.device is required when platform.supportsCamera is true"],
    });
  });

  it("rejects unknown keys and invalid values", () => {
    const { configPath } = writeConfig(
      JSON.stringify({ image: { imageQuality: 101 }, extra: true }),
    );
    const result = loadConfig(configPath);
    expect(result.success).toBe(false);
    expect(result.errors).toHaveLength(2);
    expect(result.errors?.some((error) => error.startsWith("image.imageQuality: "))).toBe(true);
  });

  it("rejects extensions written with a dot", () => {
    const { configPath } = writeConfig(JSON.stringify({ files: { allowedExtensions: [".pdf"] } }));
    expect(loadConfig(configPath).errors).toEqual([
      "files.allowedExtensions.0: extension must not contain dots or path separators",
    ]);
  });

  it("reports a missing file", () => {
    const missing = path.join(os.tmpdir(), "media-select-missing", "config.jsonc");
    expect(loadConfig(missing)).toEqual({
      success: false,
      path: missing,
      errors: [`Config file not found: ${missing}`],
    });
  });
});

describe("loadConfigOrDefaults", () => {
  it("falls back to defaults when the default file is absent", () => {
    const home = fs.mkdtempSync(path.join(os.tmpdir(), "media-select-home-"));
    tempDirs.push(home);
    vi.stubEnv("HOME", home);
    vi.stubEnv(CONFIG_ENV_VAR, "");

    const result = loadConfigOrDefaults();

    expect(result.success).toBe(true);
    expect(result.config).toEqual({ logging: { level: "info" } });
  });

  it("still requires an explicit path to exist", () => {
    const missing = path.join(os.tmpdir(), "media-select-missing", "explicit.jsonc");
    expect(loadConfigOrDefaults(missing).success).toBe(false);
  });
});
