import { defineCommand } from "citty";
import { runnerAdd, runnerList, runnerReconcile, runnerRegister, runnerRemove, runnerShow, runnerStop } from "./manage.js";
import { runnerStart } from "./start.js";
import { runnerStatus } from "./status.js";

export const runner = defineCommand({
  meta: {
    name: "runner",
    description: "Self-hosted runner lifecycle: add, register, start, stop, remove.",
  },
  subCommands: {
    add: runnerAdd,
    register: runnerRegister,
    start: runnerStart,
    stop: runnerStop,
    remove: runnerRemove,
    status: runnerStatus,
    list: runnerList,
    show: runnerShow,
    reconcile: runnerReconcile,
  },
});
