import { createGame } from "../engine/transitions";
import { execute } from "./execute";

// Reads one execute envelope from stdin and commits the output to stdout.

const BACKEND_IDENTITY = process.env.BACKEND_IDENTITY ?? "backend";
const LANE_ID = process.env.LANE_ID ?? "default";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function main(): Promise<void> {
  const raw = await readStdin();
  const output = execute(raw, () => createGame(BACKEND_IDENTITY, LANE_ID));
  process.stdout.write(`${output}\n`);
}

main().catch(err => {
  console.error("Execute failed", err);
  process.exitCode = 1;
});
