export { EnvironmentSource } from "./environment.js";
export { AppConfigSource } from "./app-config.js";
