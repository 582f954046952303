import { describe, expect, it } from "vitest";
import { JudgeError } from "./errors";
import { FakeJudge, goodJudgment } from "./test-support";
import { judgeDesign, parseJudgmentText } from "./vision-judge";

const screenshot = Buffer.from("png");

describe("parseJudgmentText", () => {
  it("pulls the JSON object out of a fenced reply", () => {
    const reply = 'Here is my review:\n```json\n{"score": 6, "assessment": "Dated but tidy.", "issues": ["Small fonts"]}\n```';

    expect(parseJudgmentText(reply)).toEqual({
      rating: 6,
      assessment: "Dated but tidy.",
      issues: ["Small fonts"],
      strengths: [],
    });
  });

  it("keeps a categorical rating as given", () => {
    expect(parseJudgmentText('{"score": "good"}').rating).toBe("good");
  });

  it("rejects replies without usable JSON", () => {
    expect(() => parseJudgmentText("I cannot see the image.")).toThrow(JudgeError);
    expect(() => parseJudgmentText("{score: 7}")).toThrow("Vision reply was not valid JSON");
    expect(() => parseJudgmentText('{"assessment": "no score"}')).toThrow("Vision reply had an unexpected shape");
  });
});

describe("judgeDesign", () => {
  it("returns the judgment when the judge answers", async () => {
    const outcome = await judgeDesign(new FakeJudge(), screenshot, "https://example-cpa.com/", 1000);
    expect(outcome).toEqual({ status: "judged", judgment: goodJudgment });
  });

  it("is unavailable without a judge or a screenshot", async () => {
    expect(await judgeDesign(null, screenshot, "https://example-cpa.com/", 1000)).toEqual({
      status: "unavailable",
      reason: "no vision judge configured (ANTHROPIC_API_KEY not set)",
    });
    expect(await judgeDesign(new FakeJudge(), null, "https://example-cpa.com/", 1000)).toEqual({
      status: "unavailable",
      reason: "no desktop screenshot was captured",
    });
  });

  it("gives up on a slow judge", async () => {
    const slow = new FakeJudge(() => new Promise((resolve) => setTimeout(() => resolve(goodJudgment), 500)));

    expect(await judgeDesign(slow, screenshot, "https://example-cpa.com/", 20)).toEqual({
      status: "unavailable",
      reason: "Vision judgment timed out after 20ms",
    });
  });

  it("captures judge errors instead of throwing", async () => {
    const broken = new FakeJudge(() => {
      throw new JudgeError("Vision reply contained no text");
    });

    expect(await judgeDesign(broken, screenshot, "https://example-cpa.com/", 1000)).toEqual({
      status: "errored",
      reason: "vision judgment failed: Vision reply contained no text",
    });
  });
});
