import { describe, it, expect } from "vitest";
import { loadEnvConfig, parseCliArgs, readFlags } from "../src/config";
import { ConfigurationError, NoInputError } from "../src/errors";

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    expect(parseCliArgs(["--url-1", "https://youtu.be/dQw4w9WgXcQ"])).toEqual({
      help: false,
      urls: ["https://youtu.be/dQw4w9WgXcQ"],
      context: "",
      outputSize: "MEDIUM",
      enableResearch: true,
      delaySeconds: 15,
    });
  });

  it("collects urls in flag order and drops blanks", () => {
    const cli = parseCliArgs(["--url-3", "third", "--url-1=first", "--url-2", "  ", "--url-10", "tenth"]);
    expect(cli.urls).toEqual(["first", "third", "tenth"]);
  });

  it("reads the remaining options", () => {
    const cli = parseCliArgs([
      "--url-1",
      "dQw4w9WgXcQ",
      "--context",
      "Serving LLMs at scale",
      "--output-size",
      "short",
      "--enable-research=False",
      "--delay",
      "0",
    ]);

    expect(cli.context).toBe("Serving LLMs at scale");
    expect(cli.outputSize).toBe("SHORT");
    expect(cli.enableResearch).toBe(false);
    expect(cli.delaySeconds).toBe(0);
  });

  it("treats anything but true as disabling research", () => {
    expect(parseCliArgs(["--url-1", "x", "--enable-research", "yes"]).enableResearch).toBe(false);
    expect(parseCliArgs(["--url-1", "x", "--enable-research", "TRUE"]).enableResearch).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => parseCliArgs(["--url-1", "x", "--output-size", "HUGE"])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["--url-1", "x", "--delay", "-1"])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["--url-1", "x", "--delay", "abc"])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["--url-1", "x", "--delay", "1.5"])).toThrow(ConfigurationError);
  });

  it("requires a usable --url-1", () => {
    expect(() => parseCliArgs([])).toThrow(NoInputError);
    expect(() => parseCliArgs(["--url-2", "x"])).toThrow(NoInputError);
    expect(() => parseCliArgs(["--url-1", ""])).toThrow(NoInputError);
  });

  it("returns early for --help", () => {
    expect(parseCliArgs(["--help"]).help).toBe(true);
  });
});

describe("readFlags", () => {
  it("rejects unknown options and missing values", () => {
    expect(() => readFlags(["--foo", "bar"])).toThrow("Unknown option: --foo");
    expect(() => readFlags(["--url-11", "x"])).toThrow("Unknown option: --url-11");
    expect(() => readFlags(["--context"])).toThrow("Option --context needs a value");
    expect(() => readFlags(["--context", "--delay", "3"])).toThrow("Option --context needs a value");
    expect(() => readFlags(["stray"])).toThrow("Unexpected argument: stray");
  });

  it("keeps an equals sign inside the value", () => {
    expect(readFlags(["--url-1=https://www.youtube.com/watch?v=dQw4w9WgXcQ"]).flags).toEqual({
      "url-1": "https://www.youtube.com/watch?v=dQw4w9WgXcQ",
    });
  });
});

describe("loadEnvConfig", () => {
  it("requires the API key", () => {
    expect(() => loadEnvConfig({})).toThrow(ConfigurationError);
    expect(() => loadEnvConfig({})).toThrow(/Missing OPENAI_API_KEY/);
    expect(() => loadEnvConfig({ OPENAI_API_KEY: "   " })).toThrow(ConfigurationError);
  });

  it("fills in defaults", () => {
    expect(loadEnvConfig({ OPENAI_API_KEY: "test-secret" })).toEqual({
      apiKey: "test-secret",
      model: "gpt-5",
      thinkingEffort: "high",
      articlesDir: "articles",
      logsDir: "logs",
    });
  });

  it("honours overrides", () => {
    const env = loadEnvConfig({
      OPENAI_API_KEY: "test-secret",
      ARTICLE_MODEL: "o4-mini",
      THINKING_EFFORT: "low",
      ARTICLES_DIR: "out/articles",
      LOGS_DIR: "out/logs",
    });
    expect(env).toMatchObject({ model: "o4-mini", thinkingEffort: "low", articlesDir: "out/articles", logsDir: "out/logs" });
  });

  it("rejects an unknown thinking effort", () => {
    expect(() => loadEnvConfig({ OPENAI_API_KEY: "test-secret", THINKING_EFFORT: "extreme" })).toThrow(ConfigurationError);
  });
});
