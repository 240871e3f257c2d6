/**
 * The chargestat version, read from package.json so the CLI, the MCP
 * server and the package metadata never disagree.
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export const VERSION: string = pkg.version;
