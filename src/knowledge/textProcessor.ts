import { OpenAITextModel, describeClientError, type ClientOptions, type TextModel } from "../ai/models.js";
import { fail, ok, type ActionItemList, type Result } from "../pipeline/types.js";

export const NO_ACTION_ITEMS = "No specific action items found";

export function summaryPrompt(text: string): string {
  return `Summarize the following text in about 3-4 key sentences:

${text}

Summary:`;
}

export function actionItemsPrompt(text: string): string {
  return `Based on the following text, extract key action items.
If no specific action items are mentioned, state '${NO_ACTION_ITEMS}'.
Present the action items as a bulleted list.

Text:
${text}

Action Items:`;
}

/** True when a model answer is the "nothing to do" sentinel, in any casing. */
export function isNoActionItems(text: string): boolean {
  return text.toLowerCase().includes(NO_ACTION_ITEMS.toLowerCase());
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

export class TextProcessor {
  /** Outcome of the eager availability check; calls are attempted either way */
  available: boolean;
  availabilityWarning: string | null;

  private constructor(private model: TextModel, warning: string | null) {
    this.available = warning === null;
    this.availabilityWarning = warning;
  }

  /** Bind a processor to a model and check, without failing, that the model is reachable. */
  static async create(model: TextModel): Promise<TextProcessor> {
    try {
      await model.verify();
      console.log(`[text] Model '${model.model}' is available`);
      return new TextProcessor(model, null);
    } catch (err) {
      const { status, message } = describeClientError(err);
      const warning =
        `Model '${model.model}' not found or not reachable: ${message}` +
        (status !== undefined ? ` (status ${status})` : "") +
        ". Summaries and action items may fail.";
      console.warn(`[text] Warning: ${warning}`);
      return new TextProcessor(model, warning);
    }
  }

  static connect(modelName: string, opts: ClientOptions = {}): Promise<TextProcessor> {
    return TextProcessor.create(new OpenAITextModel(modelName, opts));
  }

  async summarize(text: string): Promise<Result<string>> {
    if (isBlank(text)) {
      return fail("empty_input", "Input text is empty, cannot summarize.");
    }
    console.log(`[text] Summarizing with '${this.model.model}'...`);

    const resp = await this.model.generate(summaryPrompt(text));
    if (!resp.ok) {
      console.error(`[text] Summarization failed: ${resp.error.message}`);
      return fail("processing_error", `Error during summarization: ${resp.error.message}`, {
        status: resp.error.status,
      });
    }
    return ok(resp.value.trim());
  }

  async extractActionItems(text: string): Promise<Result<ActionItemList>> {
    if (isBlank(text)) {
      return fail("empty_input", "Input text is empty, cannot generate action items.");
    }
    console.log(`[text] Extracting action items with '${this.model.model}'...`);

    const resp = await this.model.generate(actionItemsPrompt(text));
    if (!resp.ok) {
      console.error(`[text] Action item extraction failed: ${resp.error.message}`);
      return fail("processing_error", `Error during action item generation: ${resp.error.message}`, {
        status: resp.error.status,
      });
    }

    const answer = resp.value.trim();
    if (!answer || isNoActionItems(answer)) {
      return ok({ kind: "none", text: answer || NO_ACTION_ITEMS });
    }
    return ok({ kind: "items", text: answer });
  }
}
