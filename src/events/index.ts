export { EventLogger } from "./logger.js";
export type { EventCallback, EventLoggerOptions, SkillEvent, SkillEventType } from "./logger.js";
