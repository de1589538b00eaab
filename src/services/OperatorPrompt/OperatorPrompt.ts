export interface OperatorPrompt {
  /** 詢問是否繼續；false 代表中止整個流程 */
  askToContinue(message: string, details?: readonly string[]): Promise<boolean>;
}
