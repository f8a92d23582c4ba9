import type { ChatCompletionRequest } from "../client.js";
import { errorMessage } from "../log.js";
import { containsText } from "../match.js";
import { fail, pass, withContainerLogs, type ProbeContext, type ProbeResult } from "./types.js";

export const INFERENCE_PROMPT = "What color is grass?";
export const EXPECTED_KEYWORD = "green";

/** Known-answer prompt at temperature 0 so the keyword check is deterministic. */
export function inferenceRequest(model: string): ChatCompletionRequest {
  return {
    model,
    messages: [{ role: "user", content: INFERENCE_PROMPT }],
    max_tokens: 128,
    temperature: 0.0,
  };
}

export async function probeInference(ctx: ProbeContext, model: string): Promise<ProbeResult> {
  if (model.trim().length === 0) {
    ctx.log("===> Refusing to chat with an empty model identifier", "red");
    return fail("inference", model, "input validation: model identifier is empty");
  }

  ctx.log(`===> Attempting to chat with model ${model}...`, "cyan");
  try {
    const res = await ctx.client.chatCompletion(inferenceRequest(model));
    if (res.ok && containsText(res.body, EXPECTED_KEYWORD)) {
      ctx.log("  ✅ Inference is working", "green");
      return pass("inference", model);
    }
    ctx.log(`  ❌ Inference is not working for ${model}`, "red");
    return fail(
      "inference",
      model,
      await withContainerLogs(ctx, `POST /v1/chat/completions returned ${res.status}\nResponse: ${res.body}`),
    );
  } catch (err) {
    ctx.log(`  ❌ POST /v1/chat/completions failed: ${errorMessage(err)}`, "red");
    return fail("inference", model, await withContainerLogs(ctx, `POST /v1/chat/completions failed: ${errorMessage(err)}`));
  }
}
