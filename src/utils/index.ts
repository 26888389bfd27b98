export { CommandRunner, processExecutor, type CommandExecutor, type ShellResult } from "./shell.js";
export { consoleLogger, silentLogger, type Logger } from "./logger.js";
export { detectOsFamily } from "./platform.js";
export { platformVersion, runtimeVersion, type FileReader } from "./version.js";
