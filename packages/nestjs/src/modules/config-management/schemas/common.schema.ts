import * as Joi from "joi";

import { LOG_LEVELS, NodeEnv } from "../types/config.types";

export const commonValidationSchema = Joi.object({
  // Environment
  NODE_ENV: Joi.string()
    .valid(...Object.values(NodeEnv))
    .default(NodeEnv.DEVELOPMENT),
  PORT: Joi.number().port().default(6655),
  LOG_LEVELS: Joi.string()
    .pattern(new RegExp(`^(${LOG_LEVELS.join("|")})(,(${LOG_LEVELS.join("|")}))*$`))
    .default("log,warn,error,fatal")
    .description("Comma separated Nest logger levels to enable"),
});
