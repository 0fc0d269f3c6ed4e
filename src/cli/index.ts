import { cli } from "cleye";
import { applyCommand } from "./commands/apply.js";
import { destroyCommand } from "./commands/destroy.js";
import { forceUnlockCommand } from "./commands/force-unlock.js";
import { graphCommand } from "./commands/graph.js";
import { planCommand } from "./commands/plan.js";
import { stateCommand } from "./commands/state.js";
import { validateCommand } from "./commands/validate.js";

export const VERSION = "0.1.0";

export const run = (argv: string[]): void => {
  cli(
    {
      name: "stratum",
      version: VERSION,
      commands: [
        validateCommand,
        planCommand,
        applyCommand,
        destroyCommand,
        stateCommand,
        forceUnlockCommand,
        graphCommand,
      ],
    },
    (parsed) => parsed.showHelp(),
    argv,
  );
};
