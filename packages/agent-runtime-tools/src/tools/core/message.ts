/**
 * Message Tool
 *
 * User-facing control operations. `ask` and `web-browser-takeover` hand the
 * run back to a human; `complete` declares the task finished. All three are
 * terminal: the run ends after they execute.
 */

import type { ToolResult } from "@tasklane/agent-runtime-core";
import type { RuntimeLogger } from "@tasklane/agent-runtime-telemetry/logging";
import {
  failureResult,
  type OperationDeclarer,
  successResult,
  ToolCapability,
  xmlMapping,
} from "../capability/toolCapability";
import type { BoundParameters } from "../capability/binding";

export const ASK_EXAMPLE = `<ask attachments="notes/outline.md">
  The outline lists two possible report formats. Which one should I use?
  1. A single summary page
  2. A detailed multi-section report
</ask>`;

export const TAKEOVER_EXAMPLE = `<web-browser-takeover>
  The site is asking for a verification code sent to your phone. Please enter it,
  then let me know so I can continue.
</web-browser-takeover>`;

export const COMPLETE_EXAMPLE = `<complete>
<!-- Signals that every task is finished -->
</complete>`;

export function parseAttachments(value: string | null): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export class MessageTool extends ToolCapability {
  readonly name = "message";

  protected declareOperations(declare: OperationDeclarer): void {
    declare
      .operation(
        "ask",
        "Ask the user a question and wait for the answer. Use only when user input is required to proceed."
      )
      .param({ name: "text", type: "string", required: true, description: "The question" })
      .param({
        name: "attachments",
        type: "string",
        description: "Comma-separated file paths or URLs related to the question",
      })
      .asFunction()
      .asXml("ask", {
        mappings: [
          xmlMapping("text", "content", ".", { required: true }),
          xmlMapping("attachments", "attribute", "attachments"),
        ],
        example: ASK_EXAMPLE,
      })
      .terminal("pause")
      .handle((params, { logger }) =>
        this.handOff(params, "Awaiting user response...", logger)
      );

    declare
      .operation(
        "web-browser-takeover",
        "Ask the user to take over the browser for steps automation cannot perform, such as verification challenges."
      )
      .param({ name: "text", type: "string", required: true, description: "Instructions for the user" })
      .param({ name: "attachments", type: "string" })
      .asXml("web-browser-takeover", {
        mappings: [
          xmlMapping("text", "content", ".", { required: true }),
          xmlMapping("attachments", "attribute", "attachments"),
        ],
        example: TAKEOVER_EXAMPLE,
      })
      .terminal("pause")
      .handle((params, { logger }) =>
        this.handOff(params, "Awaiting user browser takeover...", logger)
      );

    declare
      .operation(
        "complete",
        "Declare that every task is finished. Use only once all work has been delivered."
      )
      .asFunction()
      .asXml("complete", { example: COMPLETE_EXAMPLE })
      .terminal("complete")
      .handle((_params, { logger }) => {
        logger.info("Agent declared completion");
        return successResult({ status: "complete" });
      });
  }

  private handOff(
    params: BoundParameters,
    status: string,
    logger: RuntimeLogger
  ): ToolResult {
    const text = params.string("text");
    if (!text || !text.trim()) {
      return failureResult("Missing required argument: text");
    }
    const attachments = parseAttachments(params.string("attachments"));
    logger.info("Handing control to the user", { attachments: attachments.length });
    return successResult(attachments.length > 0 ? { status, attachments } : { status });
  }
}
