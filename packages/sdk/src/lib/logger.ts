import { getLogger } from "@logtape/logtape";

export const logger = getLogger(["contract-bench", "sdk"]);
