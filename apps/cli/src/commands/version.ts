import { defineCommand } from "citty";
import { printHeader } from "../tui/components/header.js";
import { getVersion } from "../utils/version.js";

export const versionCommand = defineCommand({
  meta: {
    name: "version",
    description: "Show macrobench version",
  },
  run: () => {
    printHeader("version");
    console.log(`v${getVersion()}`);
    console.log();
  },
});
