import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { type Interfaces, execute } from "@oclif/core";

const COMMANDS_FILE = "./dist/commands.js";

export async function run(): Promise<void> {
  const root = fileURLToPath(new URL("..", import.meta.url));
  const pjson: Interfaces.PJSON = JSON.parse(fs.readFileSync(path.join(root, "package.json"), "utf8"));
  pjson.oclif = {
    ...pjson.oclif,
    commands: {
      strategy: "explicit",
      target: COMMANDS_FILE,
      identifier: "COMMANDS",
    },
  };

  await execute({
    loadOptions: {
      pjson,
      root,
    },
  });
}
