import { command } from "cleye";
import { runStateList, runStateShow } from "../state.js";
import { finish } from "./finish.js";

export const stateCommand = command(
  {
    name: "state",
    help: {
      description: "Inspect recorded state: `state list` or `state show <address>`",
    },
    parameters: ["<action>", "[address]"],
    flags: {
      config: {
        type: String,
        description: "Config file (default: stratum.json)",
      },
    },
  },
  async (argv) => {
    const { action, address } = argv._;
    if (action === "list") {
      await finish(runStateList({ configPath: argv.flags.config }));
    } else if (action === "show" && address !== undefined) {
      await finish(runStateShow({ configPath: argv.flags.config, address }));
    } else {
      console.error("Usage: stratum state list | stratum state show <address>");
      process.exitCode = 1;
    }
  },
);
