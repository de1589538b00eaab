import type { Logger } from "~shared/Logger";

import { confirm } from "@/utils/helper";

import type { OperatorPrompt } from "./OperatorPrompt";

export class OperatorPromptReadline implements OperatorPrompt {
  private readonly logger: Logger;
  private readonly assumeYes: boolean;

  constructor(deps: { logger: Logger; assumeYes?: boolean }) {
    this.logger = deps.logger.extend("OperatorPrompt");
    this.assumeYes = deps.assumeYes ?? false;
  }

  async askToContinue(message: string, details: readonly string[] = []) {
    for (const line of details) this.logger.warn({ event: "detail" })`${line}`;
    if (this.assumeYes) {
      this.logger.warn({ event: "auto-continue" })`${message}（--yes 自動繼續）`;
      return true;
    }
    return confirm(`${message} 要繼續嗎？(y/N) `);
  }
}
