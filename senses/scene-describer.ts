/**
 * Scene description via a Claude vision model.
 *
 * Encodes the frame to JPEG and asks the model for one short sentence
 * about what is visible, or a few sentences for a full analysis.
 */

import Anthropic from "@anthropic-ai/sdk";

import { encodeJpeg } from "./frame-source.js";

import type { DescriptionDetail, Frame, SceneDescriber, SceneDescription } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Model for scene descriptions */
const DESCRIBE_MODEL = "claude-haiku-4-5-20251001";

/** Max tokens for a one-sentence description */
const DESCRIBE_MAX_TOKENS = 100;

const FULL_MAX_TOKENS = 300;

const CAMERA_PROMPT =
  "Describe what you see in one short sentence. Focus on people, what they are doing, and anything that changed. No preamble.";

const SCREEN_PROMPT =
  "Describe what is on this screen in one short sentence: the application, and what the user appears to be doing. No preamble.";

const CAMERA_FULL_PROMPT =
  "Describe this scene in two or three sentences: who is there, what they are doing, their apparent mood, and the surroundings. No preamble.";

const SCREEN_FULL_PROMPT =
  "Describe this screen in two or three sentences: the applications and windows visible, the content in focus, and the task the user seems to be working on. No preamble.";

// ============================================================================
// INTERFACES
// ============================================================================

export interface SceneDescriberConfig {
  /** Which prompt to use */
  kind: "camera" | "screen";
  /** Falls back to ANTHROPIC_API_KEY in the environment when omitted */
  apiKey?: string;
  model?: string;
  /** Replace the brief prompt entirely */
  prompt?: string;
  /** Replace the full-analysis prompt entirely */
  fullPrompt?: string;
  /** Frame encoder, ffmpeg JPEG by default */
  encode?: (frame: Frame) => Promise<Buffer>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a SceneDescriber backed by the Anthropic Messages API.
 */
export function createSceneDescriber(config: SceneDescriberConfig): SceneDescriber {
  const client = config.apiKey ? new Anthropic({ apiKey: config.apiKey }) : new Anthropic();
  const model = config.model ?? DESCRIBE_MODEL;
  const prompts: Record<DescriptionDetail, string> = {
    brief: config.prompt ?? (config.kind === "screen" ? SCREEN_PROMPT : CAMERA_PROMPT),
    full: config.fullPrompt ?? (config.kind === "screen" ? SCREEN_FULL_PROMPT : CAMERA_FULL_PROMPT),
  };
  const encode = config.encode ?? ((frame: Frame) => encodeJpeg(frame));

  /**
   * @throws Error if encoding fails, the API call fails, or the reply has no text
   */
  async function describe(frame: Frame, detail: DescriptionDetail = "brief"): Promise<SceneDescription> {
    const t0 = Date.now();
    const jpeg = await encode(frame);

    const response = await client.messages.create({
      model,
      max_tokens: detail === "full" ? FULL_MAX_TOKENS : DESCRIBE_MAX_TOKENS,
      messages: [
        {
          role: "user",
          content: [
            {
              type: "image",
              source: { type: "base64", media_type: "image/jpeg", data: jpeg.toString("base64") },
            },
            { type: "text", text: prompts[detail] },
          ],
        },
      ],
    });

    const firstBlock = response.content[0];
    if (!firstBlock || firstBlock.type !== "text") {
      throw new Error(`Unexpected scene description block type: ${firstBlock ? firstBlock.type : "none"}`);
    }

    return { text: firstBlock.text.trim(), latencyMs: Date.now() - t0 };
  }

  return { describe };
}
