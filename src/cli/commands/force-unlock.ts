import { command } from "cleye";
import { runForceUnlock } from "../force-unlock.js";
import { finish } from "./finish.js";

export const forceUnlockCommand = command(
  {
    name: "force-unlock",
    help: {
      description: "Release a stuck lock on the state",
    },
    parameters: ["<lockId>"],
    flags: {
      config: {
        type: String,
        description: "Config file (default: stratum.json)",
      },
    },
  },
  async (argv) => {
    await finish(runForceUnlock({ configPath: argv.flags.config, lockId: argv._.lockId }));
  },
);
