import { getVersion } from "../../utils/version.js";
import { ANSI_RESET, colors, hexToAnsi } from "../styles.js";

export const printHeader = (command: string): void => {
  const brandAnsi = hexToAnsi(colors.brand);
  console.log();
  console.log(`${brandAnsi}macrobench v${getVersion()}${ANSI_RESET} ${command}`);
  console.log();
};
