import { Injectable } from "@nestjs/common";

import {
  isSentimentCategory,
  SentimentCategory,
} from "../../../../../../common/types/sentiment.type";
import {
  InjectResponseTemplates,
  type ResponseTemplate,
  type ResponseTemplateCatalog,
} from "../response-templates";

/**
 * Read-only lookup of reply templates by category. Categories without their
 * own templates borrow the neutral ones.
 */
@Injectable()
export class ResponseTemplateStore {
  private readonly templates: ReadonlyMap<
    SentimentCategory,
    readonly ResponseTemplate[]
  >;

  constructor(@InjectResponseTemplates() catalog: ResponseTemplateCatalog) {
    const entries = Object.entries(catalog).flatMap(
      ([category, templates]): [SentimentCategory, readonly string[]][] =>
        isSentimentCategory(category) && templates && templates.length > 0
          ? [[category, Object.freeze([...templates])]]
          : [],
    );

    this.templates = new Map(entries);

    if (!this.templates.has(SentimentCategory.NEUTRAL)) {
      throw new Error("Response templates must include the neutral category");
    }
  }

  templatesFor(category: SentimentCategory): readonly ResponseTemplate[] {
    return (
      this.templates.get(category) ??
      this.templates.get(SentimentCategory.NEUTRAL) ??
      []
    );
  }
}
