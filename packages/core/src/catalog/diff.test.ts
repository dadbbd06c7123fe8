import { describe, it, expect } from "vitest";
import { diffCatalog } from "./diff.js";

const URL_A = "https://docs.google.com/spreadsheets/d/aaa/";
const URL_B = "https://docs.google.com/spreadsheets/d/bbb/";

describe("diffCatalog", () => {
  it("is empty when both catalogs are equal", () => {
    const remote = new Map([
      ["alpha", URL_A],
      ["beta", URL_B],
    ]);
    const cached = new Map([
      ["beta", URL_B],
      ["alpha", URL_A],
    ]);

    expect(diffCatalog(remote, cached).size).toBe(0);
  });

  it("reports exactly the one key added upstream", () => {
    const cached = new Map([["alpha", URL_A]]);
    const remote = new Map([
      ["alpha", URL_A],
      ["beta", URL_B],
    ]);

    expect([...diffCatalog(remote, cached)]).toEqual([["beta", URL_B]]);
  });

  it("reports entries whose URL changed", () => {
    const cached = new Map([["alpha", URL_A]]);
    const remote = new Map([["alpha", URL_B]]);

    expect([...diffCatalog(remote, cached)]).toEqual([["alpha", URL_B]]);
  });

  it("compares URLs as exact strings", () => {
    const cached = new Map([["alpha", URL_A]]);
    const remote = new Map([["alpha", URL_A.toUpperCase()]]);

    expect(diffCatalog(remote, cached).size).toBe(1);
  });

  it("does not report entries removed upstream", () => {
    const cached = new Map([
      ["alpha", URL_A],
      ["beta", URL_B],
    ]);
    const remote = new Map([["alpha", URL_A]]);

    expect(diffCatalog(remote, cached).size).toBe(0);
  });

  it("treats everything as changed against an empty cache", () => {
    const remote = new Map([
      ["alpha", URL_A],
      ["beta", URL_B],
    ]);

    expect(diffCatalog(remote, new Map())).toEqual(remote);
  });
});
