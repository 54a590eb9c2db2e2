/**
 * Task List Tool
 *
 * Reads and rewrites the run's todo document in the workspace.
 */

import type { Workspace } from "@tasklane/agent-runtime-core";
import { z } from "zod";
import {
  failureResult,
  type OperationDeclarer,
  successResult,
  ToolCapability,
  xmlMapping,
} from "../capability/toolCapability";

export const DEFAULT_TODO_PATH = "/workspace/todo.md";

export const taskItemSchema = z.object({
  title: z.string().min(1),
  done: z.boolean().default(false),
});

export type TaskItem = z.infer<typeof taskItemSchema>;

export function renderTaskItem(item: TaskItem): string {
  return `- [${item.done ? "x" : " "}] ${item.title}`;
}

export class TaskListTool extends ToolCapability {
  readonly name = "task_list";

  constructor(
    private readonly workspace: Workspace,
    private readonly todoPath: string = DEFAULT_TODO_PATH
  ) {
    super();
  }

  protected declareOperations(declare: OperationDeclarer): void {
    declare
      .operation("read_todo", "Read the current todo document.")
      .asFunction()
      .handle(async () => {
        const content = await this.workspace.readFile(this.todoPath);
        return successResult(content ?? "");
      });

    declare
      .operation("write_todo", "Replace the todo document, or append to it.")
      .param({ name: "content", type: "string", required: true })
      .param({ name: "append", type: "boolean", description: "Append instead of replacing" })
      .asFunction()
      .asXml("write-todo", {
        mappings: [
          xmlMapping("content", "content"),
          xmlMapping("append", "attribute", "append", { valueType: "boolean" }),
        ],
      })
      .handle(async (params) => {
        const content = params.string("content");
        if (content === null) {
          return failureResult("Missing required argument: content");
        }
        const next = params.boolean("append")
          ? `${(await this.workspace.readFile(this.todoPath)) ?? ""}${content}`
          : content;
        await this.workspace.writeFile(this.todoPath, next);
        return successResult(`Wrote ${next.length} characters to ${this.todoPath}`);
      });

    declare
      .operation("add_task", "Append a checklist item to the todo document.")
      .param({ name: "task", type: "structured", schema: taskItemSchema, required: true })
      .asFunction()
      .handle(async (params) => {
        const task = params.structured("task", taskItemSchema);
        if (!task) {
          return failureResult("Invalid argument: task must be an object with a title");
        }
        const current = (await this.workspace.readFile(this.todoPath)) ?? "";
        const line = renderTaskItem(task);
        const next = current.trim() ? `${current.replace(/\s+$/, "")}\n${line}\n` : `${line}\n`;
        await this.workspace.writeFile(this.todoPath, next);
        return successResult(line);
      });
  }
}
