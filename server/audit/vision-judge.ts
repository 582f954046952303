import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import type { DesignJudgment, JudgeContext, JudgeOutcome, VisionJudge } from "./types";
import { JudgeError, errorMessage } from "./errors";
import { TimeoutError, withTimeout } from "./timeout";

const MAX_TOKENS = 1024;

export const DESIGN_PROMPT = `Analyze this website homepage for an accountant/CPA firm. Evaluate:

1. **Overall Design Quality**: Does it look modern and professional, or outdated?
2. **Visual Hierarchy**: Is the page well-organized with clear sections?
3. **Color Scheme**: Is it professional and appropriate for a financial services firm?
4. **Typography**: Is the text readable and professionally styled?
5. **Imagery**: Are images professional quality and relevant?
6. **White Space**: Is there good use of spacing, or does it feel cluttered?

Provide a brief assessment (2-3 sentences) and a score from 1-10, where:
- 1-3: Severely outdated, unprofessional
- 4-6: Acceptable but could use improvement
- 7-8: Good, modern design
- 9-10: Excellent, highly professional

Format your response as JSON:
{
    "score": <number>,
    "assessment": "<your assessment>",
    "issues": ["<issue 1>", "<issue 2>", ...],
    "strengths": ["<strength 1>", "<strength 2>", ...]
}`;

const JudgmentReplySchema = z.object({
  score: z.union([z.number(), z.string()]),
  assessment: z.string().default(""),
  issues: z.array(z.string()).default([]),
  strengths: z.array(z.string()).default([]),
});

/**
 * Pulls the JSON object out of a model reply (fenced or surrounded by prose)
 * and validates its shape. The rating is passed through untouched; the
 * scorer decides whether it can be interpreted.
 */
export function parseJudgmentText(text: string): DesignJudgment {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) {
    throw new JudgeError("Vision reply did not contain a JSON object");
  }

  let data: unknown;
  try {
    data = JSON.parse(match[0]);
  } catch (e) {
    throw new JudgeError(`Vision reply was not valid JSON: ${errorMessage(e)}`);
  }

  const parsed = JudgmentReplySchema.safeParse(data);
  if (!parsed.success) {
    throw new JudgeError(`Vision reply had an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  return {
    rating: parsed.data.score,
    assessment: parsed.data.assessment,
    issues: parsed.data.issues,
    strengths: parsed.data.strengths,
  };
}

export interface AnthropicVisionJudgeOptions {
  apiKey: string;
  model: string;
}

export class AnthropicVisionJudge implements VisionJudge {
  private readonly client: Anthropic;
  private readonly model: string;

  constructor({ apiKey, model }: AnthropicVisionJudgeOptions) {
    this.client = new Anthropic({ apiKey });
    this.model = model;
  }

  async judge(screenshot: Buffer, context: JudgeContext): Promise<DesignJudgment> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: MAX_TOKENS,
        messages: [
          {
            role: "user",
            content: [
              {
                type: "image",
                source: { type: "base64", media_type: "image/png", data: screenshot.toString("base64") },
              },
              { type: "text", text: DESIGN_PROMPT },
            ],
          },
        ],
      },
      { signal: context.signal }
    );

    const textContent = response.content.find((block) => block.type === "text");
    if (!textContent || textContent.type !== "text") {
      throw new JudgeError("Vision reply contained no text");
    }

    return parseJudgmentText(textContent.text);
  }
}

/**
 * Asks the judge for a design rating with a hard deadline. Never throws:
 * a missing judge or screenshot is "unavailable", a timeout is
 * "unavailable", and anything the judge raises is "errored".
 */
export async function judgeDesign(
  judge: VisionJudge | null,
  screenshot: Buffer | null,
  url: string,
  timeoutMs: number
): Promise<JudgeOutcome> {
  if (!judge) {
    return { status: "unavailable", reason: "no vision judge configured (ANTHROPIC_API_KEY not set)" };
  }
  if (!screenshot) {
    return { status: "unavailable", reason: "no desktop screenshot was captured" };
  }

  try {
    const judgment = await withTimeout("Vision judgment", timeoutMs, (signal) =>
      judge.judge(screenshot, { url, signal })
    );
    return { status: "judged", judgment };
  } catch (error) {
    if (error instanceof TimeoutError) {
      return { status: "unavailable", reason: error.message };
    }
    return { status: "errored", reason: `vision judgment failed: ${errorMessage(error)}` };
  }
}
