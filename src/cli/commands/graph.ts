import { command } from "cleye";
import { runGraph } from "../graph.js";
import { finish } from "./finish.js";

export const graphCommand = command(
  {
    name: "graph",
    help: {
      description: "Print the dependency graph in DOT format",
    },
    flags: {
      config: {
        type: String,
        description: "Config file (default: stratum.json)",
      },
    },
  },
  async (argv) => {
    await finish(runGraph({ configPath: argv.flags.config }));
  },
);
