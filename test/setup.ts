import { configureLogging } from "../src/logger.js";

configureLogging({ level: "none" });
