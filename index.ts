#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { main } from "./src/index.js";

export { main };

// Allow `node dist/index.js` direct execution, including through the npm bin symlink
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(fs.realpathSync(entry)).href) {
  void main(process.argv);
}
