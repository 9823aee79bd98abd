/**
 * Entrypoint — Node native http, no framework.
 */

import { main } from "./main.js";

await main();
