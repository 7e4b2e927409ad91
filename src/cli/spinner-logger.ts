/**
 * Logger that shows info messages as the text of an ora spinner
 * Other levels are printed above the spinner
 */

import type { Ora } from "ora";
import { Logger, type LogLevel } from "../utils/logger";

export class SpinnerLogger extends Logger {
  constructor(
    private spinner: Ora,
    level: LogLevel = "info",
  ) {
    super(level);
  }

  protected override write(
    level: "debug" | "info" | "warn" | "error",
    message: string,
  ): void {
    if (level === "info" && this.spinner.isSpinning) {
      this.spinner.text = message;
      return;
    }

    const spinning = this.spinner.isSpinning;
    if (spinning) this.spinner.clear();
    super.write(level, message);
    if (spinning) this.spinner.render();
  }
}
