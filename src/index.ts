#!/usr/bin/env node

import { runCli } from "./cli.js";
import { initI18n, isSupportedLanguage } from "./i18n/index.js";

async function main(): Promise<number> {
  const envLanguage = process.env.REPOSYNC_LANG;
  await initI18n(envLanguage && isSupportedLanguage(envLanguage) ? envLanguage : "en");

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  return runCli(process.argv.slice(2), { signal: controller.signal });
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("reposync failed:", err);
    process.exit(1);
  });
