import { describe, expect, it } from "vitest";
import {
  compareRequirements,
  mergeRequirementLists,
  requirementKey,
  requirementName,
  toRequirementList,
} from "../parsers/requirements.js";

describe("requirementName", () => {
  it("stops at extras, comparisons and markers", () => {
    expect(requirementName("aiohttp==4.3")).toBe("aiohttp");
    expect(requirementName("requests[socks]>=2.0")).toBe("requests");
    expect(requirementName("pywin32; sys_platform == 'win32'")).toBe("pywin32");
    expect(requirementName("zope.interface ~= 5.0")).toBe("zope.interface");
  });

  it("uses the whole text when there's no name", () => {
    expect(requirementName("  ==1.0 ")).toBe("==1.0");
  });

  it("compares names case-insensitively", () => {
    expect(requirementKey("isorT==1.3")).toBe(requirementKey("isort==4.3"));
  });
});

describe("toRequirementList", () => {
  it("splits single-line values and keeps lists", () => {
    expect(toRequirementList("a\n\n b ")).toEqual(["a", "b"]);
    expect(toRequirementList(["x", "y"])).toEqual(["x", "y"]);
    expect(toRequirementList(undefined)).toEqual([]);
  });
});

describe("mergeRequirementLists", () => {
  it("keeps the target's pin when both sides name a requirement", () => {
    expect(
      mergeRequirementLists(["isort==4.3", "Black"], ["aiohttp==4.3", "isorT==1.3"]),
    ).toEqual(["aiohttp==4.3", "Black", "isorT==1.3"]);
  });

  it("adds a template requirement once", () => {
    expect(mergeRequirementLists(["pytest", "PyTest>=7"], [])).toEqual(["pytest"]);
  });

  it("keeps target-only requirements", () => {
    expect(mergeRequirementLists([], ["flask"])).toEqual(["flask"]);
  });

  it("breaks case-insensitive ties by byte order", () => {
    expect(["abc", "ABC", "Abd"].sort(compareRequirements)).toEqual(["ABC", "abc", "Abd"]);
  });
});
