import { command } from "cleye";
import { runPlanCommand } from "../plan.js";
import { finish } from "./finish.js";

export const planCommand = command(
  {
    name: "plan",
    alias: "diff",
    help: {
      description: "Show the changes needed to converge infrastructure to the declarations",
    },
    flags: {
      config: {
        type: String,
        description: "Config file (default: stratum.json)",
      },
      destroy: {
        type: Boolean,
        description: "Plan the deletion of everything in state",
      },
      skipRefresh: {
        type: Boolean,
        description: "Plan against recorded state without reading remote objects",
      },
      detailedExitcode: {
        type: Boolean,
        description: "Exit with 2 when there are changes",
      },
      verbose: {
        type: Boolean,
        alias: "v",
        description: "Show the attributes of created resources",
      },
    },
  },
  async (argv) => {
    await finish(
      runPlanCommand({
        configPath: argv.flags.config,
        destroy: argv.flags.destroy,
        skipRefresh: argv.flags.skipRefresh,
        detailedExitcode: argv.flags.detailedExitcode,
        verbose: argv.flags.verbose,
      }),
    );
  },
);
