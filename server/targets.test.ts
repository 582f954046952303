import { describe, expect, it } from "vitest";
import { parseTargets, splitCsvLine } from "./targets";

describe("splitCsvLine", () => {
  it("handles quoted commas and doubled quotes", () => {
    expect(splitCsvLine('"Smith, Jones & Co","https://sj.example.com","says ""hi"""')).toEqual([
      "Smith, Jones & Co",
      "https://sj.example.com",
      'says "hi"',
    ]);
  });
});

describe("parseTargets", () => {
  it("reads a CSV with company names and notes", () => {
    const csv = [
      "\uFEFFcompany_name,url,notes",
      "Example CPA,example-cpa.com,referral",
      "Ledger LLP,https://ledger.example.com,",
      ",,",
    ].join("\r\n");

    expect(parseTargets(csv)).toEqual([
      { url: "example-cpa.com", company: "Example CPA", notes: "referral" },
      { url: "https://ledger.example.com", company: "Ledger LLP" },
    ]);
  });

  it("reads one URL per line, skipping comments and blanks", () => {
    const text = "# prospects\nexample-cpa.com\n\nledger.example.com\n";

    expect(parseTargets(text)).toEqual([{ url: "example-cpa.com" }, { url: "ledger.example.com" }]);
  });

  it("drops repeats of the same site", () => {
    const text = "example-cpa.com\nhttps://example-cpa.com/\nhttps://example-cpa.com/#top";

    expect(parseTargets(text)).toEqual([{ url: "example-cpa.com" }]);
  });

  it("returns nothing for an empty file", () => {
    expect(parseTargets("\n# nothing yet\n")).toEqual([]);
  });
});
