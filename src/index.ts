#!/usr/bin/env node
import { runCli } from "./main";

runCli(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`予期しないエラーが発生しました: ${message}`);
  process.exitCode = 1;
});
