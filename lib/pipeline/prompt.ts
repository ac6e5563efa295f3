import path from "node:path";
import { Liquid, Tag, type TagToken, type TopLevelToken, type Template } from "liquidjs";
import type { Context } from "liquidjs";
import type { Emitter } from "liquidjs";

export interface PromptMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Custom {% chat role: "system"|"user"|"assistant" %} ... {% endchat %} tag.
 * Emits delimiters that renderPrompt splits on to produce PromptMessage[].
 */
class ChatTag extends Tag {
  private role: string;

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    const match = token.args.match(/role:\s*"(\w+)"/);
    if (!match) {
      throw new Error(`{% chat %} requires role: "system"|"user"|"assistant"`);
    }
    this.role = match[1];
    this.templates = [];
    const stream = liquid.parser
      .parseStream(remainTokens)
      .on("tag:endchat", () => stream.stop())
      .on("template", (tpl: Template) =>
        this.templates.push(tpl)
      )
      .on("end", () => {
        throw new Error("{% chat %} missing {% endchat %}");
      });
    stream.start();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    emitter.write(`\x01CHAT:${this.role}\x01`);
    yield this.liquid.renderer.renderTemplates(
      this.templates,
      ctx,
      emitter
    );
    emitter.write(`\x01ENDCHAT\x01`);
  }

  private templates: Template[];
}

export const PROMPTS_DIR = path.resolve(
  path.dirname(new URL(import.meta.url).pathname),
  "../../prompts"
);

export function createPromptEngine(root: string = PROMPTS_DIR): Liquid {
  const engine = new Liquid({
    root: [root],
    extname: ".liquid",
    strictVariables: false,
  });
  engine.registerTag("chat", ChatTag);
  return engine;
}

const engine = createPromptEngine();

/**
 * Render a .liquid prompt template and return structured PromptMessage[].
 * The template must use {% chat role: "..." %} blocks.
 */
export async function renderPrompt(
  templateName: string,
  context: Record<string, unknown>,
  liquid: Liquid = engine
): Promise<PromptMessage[]> {
  const raw = await liquid.renderFile(templateName, context);
  return parseMessages(raw);
}

export function parseMessages(raw: string): PromptMessage[] {
  const messages: PromptMessage[] = [];
  const chatRegex = /\x01CHAT:(\w+)\x01([\s\S]*?)\x01ENDCHAT\x01/g;

  for (const match of raw.matchAll(chatRegex)) {
    const role = toRole(match[1]);
    const content = match[2].trim();
    if (content) messages.push({ role, content });
  }

  return messages;
}

function toRole(value: string): PromptMessage["role"] {
  switch (value) {
    case "system":
    case "user":
    case "assistant":
      return value;
    default:
      throw new Error(`Unknown chat role: ${value}`);
  }
}
