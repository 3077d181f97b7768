import * as Joi from "joi";

export const conversationValidationSchema = Joi.object({
  RESPONSE_RANDOM_SEED: Joi.number()
    .integer()
    .optional()
    .description("Seed for template selection, unset for non-reproducible picks"),
  SESSION_RECENT_LIMIT: Joi.number().integer().min(1).default(5),
});
