#!/usr/bin/env -S node --import tsx
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { runMain } from "citty";
import { config } from "dotenv";
import { main } from "./commands/index.js";

config({ path: resolve(dirname(fileURLToPath(import.meta.url)), "..", ".env") });

await runMain(main);
