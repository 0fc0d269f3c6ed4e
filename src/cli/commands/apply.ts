import { command } from "cleye";
import { runApplyCommand } from "../apply.js";
import { finish } from "./finish.js";

export const applyCommand = command(
  {
    name: "apply",
    alias: "deploy",
    help: {
      description: "Plan and apply the changes under one state lock",
    },
    flags: {
      config: {
        type: String,
        description: "Config file (default: stratum.json)",
      },
      skipRefresh: {
        type: Boolean,
        description: "Plan against recorded state without reading remote objects",
      },
      parallelism: {
        type: Number,
        description: "Maximum number of concurrent provider calls",
      },
    },
  },
  async (argv) => {
    await finish(
      runApplyCommand({
        configPath: argv.flags.config,
        skipRefresh: argv.flags.skipRefresh,
        parallelism: argv.flags.parallelism,
      }),
    );
  },
);
