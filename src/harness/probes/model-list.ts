import { errorMessage } from "../log.js";
import { containsText } from "../match.js";
import { fail, pass, withContainerLogs, type ProbeContext, type ProbeResult } from "./types.js";

export async function probeModelList(ctx: ProbeContext, model: string): Promise<ProbeResult> {
  if (model.trim().length === 0) {
    ctx.log("===> Refusing to look up an empty model identifier", "red");
    return fail("list", model, "input validation: model identifier is empty");
  }

  ctx.log(`===> Looking for model ${model}...`, "cyan");
  try {
    const res = await ctx.client.listModels();
    if (res.ok && containsText(res.body, model)) {
      ctx.log(`  ✅ Model ${model} was found`, "green");
      return pass("list", model);
    }
    ctx.log(`  ❌ Model ${model} was not found`, "red");
    return fail("list", model, await withContainerLogs(ctx, `GET /v1/models returned ${res.status}\nResponse: ${res.body}`));
  } catch (err) {
    ctx.log(`  ❌ GET /v1/models failed: ${errorMessage(err)}`, "red");
    return fail("list", model, await withContainerLogs(ctx, `GET /v1/models failed: ${errorMessage(err)}`));
  }
}
