import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

// Must be the first import of an entry point: monitoring configuration reads
// process.env as soon as its module loads.
dotenvExpand.expand(dotenv.config());
