import { Intent, Logger, PacwardenError, silentLogger } from "../../shared/src";
import { matchRules } from "./rules";
import { firstReplyLine, IntentTranslator, SYSTEM_PROMPT } from "./translator";

/** One link in the resolution chain; `undefined` passes to the next source. */
export type ResolutionSource = {
  readonly name: string;
  resolve(text: string): Promise<Intent | undefined>;
};

export const ruleSource: ResolutionSource = {
  name: "rules",
  resolve: async (text) => matchRules(text, "rules"),
};

export type TranslatorSourceOptions = {
  offline: boolean;
  logger?: Logger;
};

export const translatorSource = (
  translator: IntentTranslator | undefined,
  options: TranslatorSourceOptions
): ResolutionSource => {
  const logger = options.logger ?? silentLogger();
  return {
    name: "translator",
    resolve: async (text) => {
      if (options.offline || !translator || !translator.available()) return undefined;
      try {
        const reply = await translator.translate({ system: SYSTEM_PROMPT, user: text });
        const line = firstReplyLine(reply);
        const intent = line === undefined ? undefined : matchRules(line, "translator");
        if (!intent) logger.warn({ translator: translator.name, reply }, "translator reply outside vocabulary");
        return intent;
      } catch (err) {
        const detail = err instanceof PacwardenError ? err.toSafe() : { message: String(err) };
        logger.warn({ translator: translator.name, error: detail }, "translator unavailable");
        return undefined;
      }
    },
  };
};

export class IntentResolver {
  constructor(private readonly sources: ResolutionSource[]) {}

  async resolve(text: string): Promise<Intent> {
    for (const source of this.sources) {
      const intent = await source.resolve(text);
      if (intent) return intent;
    }
    return { kind: "unknown", text };
  }
}

export const createResolver = (
  translator: IntentTranslator | undefined,
  options: TranslatorSourceOptions
): IntentResolver => new IntentResolver([ruleSource, translatorSource(translator, options)]);
