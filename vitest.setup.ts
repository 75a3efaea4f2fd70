import { initServerLogging } from "#logging.js";

// Tests log nowhere unless a suite swaps in its own transports
initServerLogging({ minLevel: "silent", console: false, file: false });
