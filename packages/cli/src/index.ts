#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { stderr, stdin, stdout } from "node:process";
import { fileURLToPath } from "node:url";
import { runCli } from "./cli.js";

export { type CliIo, type CliOptions, HELP_TEXT, parseArgs, readDocument, runCli } from "./cli.js";

async function readStdin(): Promise<string> {
  stdin.setEncoding("utf8");
  let text = "";
  for await (const chunk of stdin) text += String(chunk);
  return text;
}

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    readFile: (path) => readFile(path, "utf8"),
    readStdin,
    stdout: (text) => {
      stdout.write(text);
    },
    stderr: (text) => {
      stderr.write(text);
    },
    env: process.env,
  });
}

const isMain = process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1]);
if (isMain) {
  main().catch((err: unknown) => {
    stderr.write(`cellsketch error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
}
