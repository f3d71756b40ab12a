import { RenderError, describeError } from "../errors";
import { Logger } from "../logger";

/**
 * Runs one render step. A failure is logged and swallowed so the remaining
 * artifacts of the batch still get written.
 */
export function tryRender<T>(logger: Logger, label: string, render: () => T): T | undefined {
  try {
    return render();
  } catch (error) {
    const wrapped = new RenderError(`Failed to render ${label}: ${describeError(error)}`, { cause: error });
    logger.error(wrapped.message);
    return undefined;
  }
}

export * from "./console";
export * from "./csv";
export * from "./duplicateHtml";
export * from "./html";
export * from "./json";
export * from "./markdown";
