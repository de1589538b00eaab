import type { Result } from "~shared/utils/Result";

import type { PathNotFoundError } from "@/types";

export interface VolumeLocator {
  /** 找出記憶卡掛載點 */
  locate(): Promise<Result<string, PathNotFoundError>>;
}
