import { describe, expect, it } from "vitest";
import { ConfigurationError, ParseError } from "../core/errors.js";
import type { MergeStrategy } from "../core/types.js";
import { IniDocument } from "../parsers/IniDocument.js";
import { EMPTY_MERGE_CONFIG } from "../strategies/presets.js";
import { createStrategy, mergeIniDocuments } from "../strategies/index.js";
import { strategyInput } from "./helpers.js";

function merge(strategy: MergeStrategy, template: string, target: string | null): string {
  const outcome = strategy.apply(strategyInput(template, target, { relativePath: "setup.cfg" }));
  if (outcome.action !== "write" || typeof outcome.contents !== "string") {
    throw new Error("expected a text write");
  }
  return outcome.contents;
}

const lines = (...rows: string[]) => `${rows.join("\n")}\n`;

describe("SetupCfgMerge", () => {
  const strategy = createStrategy("SetupCfgMerge");

  const template = lines(
    "[metadata]",
    "name = demo",
    "",
    "[options]",
    "install_requires =",
    "    isort==4.3",
    "    Black",
    "",
    "[options.extras_require]",
    "develop =",
    "    pytest",
    "",
    "[tool:pytest]",
    "testpaths = src",
    "addopts = -v",
  );

  const target = lines(
    "[aliases]",
    "test = pytest",
    "",
    "[freebsd]",
    "pkg = py-demo",
    "",
    "[metadata]",
    "name = old",
    "url = https://example.org",
    "",
    "[options]",
    "install_requires =",
    "    aiohttp==4.3",
    "    isorT==1.3",
    "",
    "[options.extras_require]",
    "develop =",
    "    flask",
    "fast =",
    "    librabbitmq",
    "",
    "[tool:pytest]",
    "testpaths = tests",
  );

  it("merges requirements and keeps project specific settings", () => {
    expect(merge(strategy, template, target)).toBe(
      lines(
        "[aliases]",
        "test = pytest",
        "",
        "[freebsd]",
        "pkg = py-demo",
        "",
        "[metadata]",
        "name = demo",
        "url = https://example.org",
        "",
        "[options]",
        "install_requires =",
        "    aiohttp==4.3",
        "    Black",
        "    isorT==1.3",
        "",
        "[options.extras_require]",
        "develop =",
        "    flask",
        "    pytest",
        "fast =",
        "    librabbitmq",
        "",
        "[tool:pytest]",
        "addopts = -v",
        "testpaths = tests",
      ),
    );
  });

  it("is idempotent", () => {
    const once = merge(strategy, template, target);
    expect(merge(strategy, template, once)).toBe(once);
  });

  it("writes the template's sections for a new file", () => {
    expect(merge(strategy, "[tool:pytest]\ntestpaths = src\n", null)).toBe(
      "[tool:pytest]\ntestpaths = src\n",
    );
  });

  it("uses the template's section when the target lacks a preserved one", () => {
    expect(merge(strategy, "[mypy-requests]\nignore_missing_imports = True\n", "")).toBe(
      "[mypy-requests]\nignore_missing_imports = True\n",
    );
  });

  it("reports the side that fails to parse", () => {
    expect(() => merge(strategy, template, "garbage\n")).toThrow(ParseError);
    expect(() => merge(strategy, template, "garbage\n")).toThrow(
      "setup.cfg (target), line 1: key/value line before any section header",
    );
  });

  it("rejects an invalid rule pattern", () => {
    expect(() =>
      createStrategy("SetupCfgMerge", { preserve_sections: [{ sections: "[" }] }),
    ).toThrow(ConfigurationError);
  });
});

describe("ConfigParserMerge", () => {
  it("takes rules from its config", () => {
    const strategy = createStrategy("ConfigParserMerge", {
      merge_requirements: [{ sections: "^testenv$", keys: "^deps$" }],
    });

    expect(
      merge(strategy, "[testenv]\ndeps =\n    pytest\n    coverage\n", "[testenv]\ndeps =\n    pytest==7.0\n"),
    ).toBe("[testenv]\ndeps =\n    coverage\n    pytest==7.0\n");
  });

  it("lets the template win without rules", () => {
    const strategy = createStrategy("ConfigParserMerge");
    expect(merge(strategy, "[flake8]\nmax-line-length = 100\n", "[flake8]\nmax-line-length = 79\n")).toBe(
      "[flake8]\nmax-line-length = 100\n",
    );
  });

  it("rejects unknown config keys", () => {
    expect(() => createStrategy("ConfigParserMerge", { preserve: [] })).toThrow(
      "Invalid config for strategy ConfigParserMerge",
    );
  });
});

describe("PylintrcMerge", () => {
  it("keeps the project's extension whitelist", () => {
    const strategy = createStrategy("PylintrcMerge");
    expect(
      merge(
        strategy,
        "[MASTER]\nextension-pkg-whitelist = lxml\njobs = 4\n",
        "[MASTER]\nextension-pkg-whitelist = numpy\njobs = 1\n",
      ),
    ).toBe("[MASTER]\nextension-pkg-whitelist = numpy\njobs = 4\n");
  });
});

describe("mergeIniDocuments", () => {
  it("copies target-only sections through", () => {
    const merged = mergeIniDocuments(
      IniDocument.parse("[metadata]\nname = demo\n"),
      IniDocument.parse("[aliases]\nrelease = sdist upload\n"),
      EMPTY_MERGE_CONFIG,
    );
    expect(merged.serialize()).toBe("[aliases]\nrelease = sdist upload\n\n[metadata]\nname = demo\n");
  });

  it("applies preserve_keys before merge_requirements", () => {
    const rule = { sections: /^options$/, keys: /^install_requires$/ };
    const merged = mergeIniDocuments(
      IniDocument.parse("[options]\ninstall_requires =\n    a\n    b\n"),
      IniDocument.parse("[options]\ninstall_requires =\n    c\n"),
      { mergeRequirements: [rule], preserveKeys: [rule], preserveSections: [] },
    );
    expect(merged.section("options")?.get("install_requires")).toEqual(["c"]);
  });
});
