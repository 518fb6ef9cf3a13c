import { loadSharedConfig } from "./shared.js";

export type { SharedConfig as Config } from "./shared.js";

export const config = loadSharedConfig();
