import { ZodError } from "zod";
import type { GameState } from "../engine/types";
import { GameRuleError } from "../engine/types";
import { decodeState, encodeState } from "../engine/codec";
import { processAction } from "../engine/transitions";
import type { ExecuteInput, ExecuteOutput } from "../shared/messages";
import { ExecuteInputSchema } from "../shared/messages";

/**
 * Applies one envelope to its state. Rule violations come back as a failed output
 * carrying the unchanged state; any other failure after decoding is logged and reported
 * as SERVER_ERROR with the input state.
 * An empty `state` means no game was deployed yet; `genesis` then supplies one.
 * Throws when the state blob itself cannot be decoded.
 */
export function executeInput(input: ExecuteInput, genesis?: () => GameState): ExecuteOutput {
  const game = input.state === "" && genesis ? genesis() : decodeState(input.state);
  try {
    const { state, events } = processAction(game, input.caller, input.token, input.action, input.timestamp);
    return { ok: true, state: encodeState(state), events };
  } catch (err) {
    if (err instanceof GameRuleError) {
      return { ok: false, state: encodeState(game), error: { code: err.code, message: err.message } };
    }
    return serverError(input.state, `Execute failed for ${input.action.type}`, err);
  }
}

/**
 * Opaque entry point for the proving harness: serialized envelope in, serialized output out.
 * The same input always produces the byte-identical output.
 */
export function execute(raw: string, genesis?: () => GameState): string {
  try {
    const input = ExecuteInputSchema.parse(JSON.parse(raw));
    return JSON.stringify(executeInput(input, genesis));
  } catch (err) {
    if (err instanceof SyntaxError || err instanceof ZodError) {
      const message = err instanceof ZodError ? formatIssues(err) : "Invalid JSON payload";
      const output: ExecuteOutput = { ok: false, state: "", error: { code: "BAD_INPUT", message } };
      return JSON.stringify(output);
    }
    return JSON.stringify(serverError("", "Execute failed", err));
  }
}

function serverError(state: string, context: string, err: unknown): ExecuteOutput {
  console.error(context, err);
  const message = err instanceof Error ? err.message : "Unexpected error";
  return { ok: false, state, error: { code: "SERVER_ERROR", message } };
}

function formatIssues(err: ZodError): string {
  return err.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}
