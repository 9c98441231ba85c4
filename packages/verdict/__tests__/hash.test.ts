import { describe, it, expect } from "vitest";

import { canonicalJson, sha256Hex } from "../src/index.js";

describe("canonicalJson", () => {
  it("ignores the order readings were listed in", () => {
    const a = { use_case: "drinking", strip_values: { nitrate: 25, copper: 1.5 } };
    const b = { strip_values: { copper: 1.5, nitrate: 25 }, use_case: "drinking" };

    expect(canonicalJson(a)).toBe('{"strip_values":{"copper":1.5,"nitrate":25},"use_case":"drinking"}');
    expect(canonicalJson(b)).toBe(canonicalJson(a));
  });

  it("drops undefined fields and keeps array order", () => {
    expect(canonicalJson({ sample_id: undefined, tags: ["b", "a"], location: { hint: "well" } })).toBe(
      '{"location":{"hint":"well"},"tags":["b","a"]}'
    );
  });

  it("orders keys by code unit, uppercase before lowercase", () => {
    expect(canonicalJson({ b: 1, a: 2, B: 3 })).toBe('{"B":3,"a":2,"b":1}');
  });
});

describe("sha256Hex", () => {
  it("hashes text as UTF-8", () => {
    expect(sha256Hex("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
    expect(sha256Hex(Buffer.from("abc", "utf8"))).toBe(sha256Hex("abc"));
  });
});
