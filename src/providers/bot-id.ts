export type ParsedBotId = {
  name: string;
  provider: string;
};

const MODELS_PREFIX = "models/";

/**
 * Bot ids are `<name-length>;<model-name>@<provider>`. The length prefix keeps
 * model names that contain `@` unambiguous.
 */
export function formatBotId(modelName: string, provider: string): string {
  return `${modelName.length};${modelName}@${provider}`;
}

/**
 * Splits a bot id into model name and provider. When the declared length does
 * not land on the `@` separator the id is split at its last `@` instead.
 * Anything unparsable yields empty strings.
 */
export function parseBotId(botId: string): ParsedBotId {
  const separator = botId.indexOf(";");
  if (separator <= 0) {
    return { name: "", provider: "" };
  }

  const lengthText = botId.slice(0, separator);
  const rest = botId.slice(separator + 1);
  if (!/^\d+$/.test(lengthText)) {
    return { name: "", provider: "" };
  }

  const nameLength = Number(lengthText);
  if (rest.length >= nameLength + 1 && rest.charAt(nameLength) === "@") {
    return {
      name: rest.slice(0, nameLength),
      provider: rest.slice(nameLength + 1),
    };
  }

  const at = rest.lastIndexOf("@");
  if (at < 0) {
    return { name: "", provider: "" };
  }
  return {
    name: rest.slice(0, at),
    provider: rest.slice(at + 1),
  };
}

/** True when two model names differ only by a `models/` namespace prefix. */
export function modelNamesMatch(left: string, right: string): boolean {
  return left === right || left === `${MODELS_PREFIX}${right}` || right === `${MODELS_PREFIX}${left}`;
}
