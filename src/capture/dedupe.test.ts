import { describe, it, expect } from "vitest";
import { dedupeCandidates } from "./dedupe";
import { embeddedSignature, linkSignature } from "./signature";
import { FakeElement, box } from "../testing/fake-browser";
import { silentLogger } from "../logging/logger";
import type { Candidate } from "../types/candidate";

function link(href: string): Candidate {
  return { kind: "direct-link", href, signature: linkSignature(href), handle: new FakeElement() };
}

function hrefs(candidates: Candidate[]): string[] {
  return candidates.map((c) => (c.kind === "direct-link" ? c.href : "embedded"));
}

describe("dedupeCandidates", () => {
  it("keeps the first of each post in discovery order", () => {
    const result = dedupeCandidates(
      [link("https://x.com/abc/status/100"), link("/abc/status/100"), link("https://x.com/xyz/status/200")],
      silentLogger,
    );
    expect(result).toHaveLength(2);
    expect(hrefs(result)).toEqual(["https://x.com/abc/status/100", "https://x.com/xyz/status/200"]);
  });

  it("drops a link shared twice with the same href", () => {
    const result = dedupeCandidates(
      [link("/abc/status/100"), link("/abc/status/100"), link("/xyz/status/200")],
      silentLogger,
    );
    expect(hrefs(result)).toEqual(["/abc/status/100", "/xyz/status/200"]);
  });

  it("never collapses unmatched links", () => {
    const result = dedupeCandidates([link("https://x.com/home"), link("https://x.com/home")], silentLogger);
    expect(result).toHaveLength(2);
  });

  it("keeps a direct link and an embedded card of the same post apart", () => {
    const embedded: Candidate = {
      kind: "embedded",
      signature: embeddedSignature('<a href="/abc/status/100">', "post", box(600)),
      handle: new FakeElement(),
    };
    const result = dedupeCandidates([link("/abc/status/100"), embedded], silentLogger);
    expect(result).toHaveLength(2);
  });

  it("collapses embedded cards with the same content", () => {
    const make = (y: number): Candidate => ({
      kind: "embedded",
      signature: embeddedSignature('<a href="/abc/status/100">', "Same text", box(y)),
      handle: new FakeElement(),
    });
    expect(dedupeCandidates([make(100), make(600)], silentLogger)).toHaveLength(1);
  });

  it("returns an empty list unchanged", () => {
    expect(dedupeCandidates([], silentLogger)).toEqual([]);
  });
});
