import { LogLevels, setLogLevel } from "./src/logger.js";

setLogLevel(LogLevels.silent);
