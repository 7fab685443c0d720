import { config } from "./config/index.js";
import { credentials } from "./credentials/index.js";
import { runner } from "./runner/index.js";

export const baseCommands = {
  credentials,
  runner,
  config,
};
