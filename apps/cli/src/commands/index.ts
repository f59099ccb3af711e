import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const main = defineCommand({
  meta: {
    name: "macrobench",
    version: getVersion(),
    description:
      "Run C preprocessor and compiler tests across many compilers and report the results",
  },
  subCommands: {
    run: () => import("./run.js").then((m) => m.runCommand),
    version: () => import("./version.js").then((m) => m.versionCommand),
  },
});
