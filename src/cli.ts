import { createInterface } from "node:readline/promises";

import { runCli } from "@/lib/cli";

const rl = process.stdin.isTTY ? createInterface({ input: process.stdin, output: process.stdout }) : null;

try {
  process.exitCode = await runCli(process.argv.slice(2), {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    ask: rl ? (question) => rl.question(question) : undefined,
  });
} finally {
  rl?.close();
}
