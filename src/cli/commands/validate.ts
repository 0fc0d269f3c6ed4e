import { command } from "cleye";
import { runValidate } from "../validate.js";
import { finish } from "./finish.js";

export const validateCommand = command(
  {
    name: "validate",
    help: {
      description: "Check the declarations for errors, unresolved references and cycles",
    },
    flags: {
      config: {
        type: String,
        description: "Config file (default: stratum.json)",
      },
    },
  },
  async (argv) => {
    await finish(runValidate({ configPath: argv.flags.config }));
  },
);
