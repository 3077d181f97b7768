import { Inject } from "@nestjs/common";

import type { SentimentCategory } from "../../../../../common/types/sentiment.type";

export const RESPONSE_TEMPLATES = Symbol("response-templates");

/**
 * A pre-authored reply for one sentiment category
 */
export type ResponseTemplate = string;

export type ResponseTemplateCatalog = Partial<
  Record<SentimentCategory, readonly ResponseTemplate[]>
>;

export const InjectResponseTemplates = () => Inject(RESPONSE_TEMPLATES);
