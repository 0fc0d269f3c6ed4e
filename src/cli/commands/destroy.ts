import { command } from "cleye";
import { runDestroy } from "../destroy.js";
import { finish } from "./finish.js";

export const destroyCommand = command(
  {
    name: "destroy",
    help: {
      description: "Delete every resource recorded in state",
    },
    flags: {
      config: {
        type: String,
        description: "Config file (default: stratum.json)",
      },
      skipRefresh: {
        type: Boolean,
        description: "Skip reading remote objects before planning",
      },
      parallelism: {
        type: Number,
        description: "Maximum number of concurrent provider calls",
      },
    },
  },
  async (argv) => {
    await finish(
      runDestroy({
        configPath: argv.flags.config,
        skipRefresh: argv.flags.skipRefresh,
        parallelism: argv.flags.parallelism,
      }),
    );
  },
);
