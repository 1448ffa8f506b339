import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";

import { HalPayClient, isApiException } from "@halpay/core";

export interface TaskContext {
  /**
   * Built on first use, so commands that never call the API need no credentials
   */
  getClient(): HalPayClient;
  write(line: string): void;
}

/**
 * A command the example app can run
 */
export interface Task {
  command: string;
  description: string;
  usage?: string;
  run(context: TaskContext, args: string[]): Promise<void>;
}

/**
 * Command name → task lookup
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, Task>();

  register(task: Task): this {
    if (this.tasks.has(task.command)) {
      throw new Error(`Command "${task.command}" is already registered`);
    }
    this.tasks.set(task.command, task);
    return this;
  }

  get(command: string): Task | undefined {
    return this.tasks.get(command);
  }

  list(): Task[] {
    return [...this.tasks.values()];
  }

  /**
   * One line per command, in registration order
   */
  help(): string[] {
    const width = Math.max(...this.list().map((task) => task.command.length));
    return this.list().map((task) => {
      const usage = task.usage ? ` ${task.usage}` : "";
      return `  ${task.command.padEnd(width)}  ${task.description}${usage}`;
    });
  }
}

const CONTENT_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".pdf": "application/pdf",
};

function requireArgs(args: string[], count: number, usage: string): void {
  if (args.length < count) {
    throw new Error(`Usage: ${usage}`);
  }
}

export const tasks: Task[] = [
  {
    command: "root",
    description: "Get the API root",
    async run({ getClient, write }) {
      const root = await getClient().root.get();
      for (const [rel, link] of Object.entries(root._links)) {
        write(`${rel}: ${link.href}`);
      }
    },
  },
  {
    command: "customers:list",
    description: "List customers",
    usage: "[search]",
    async run({ getClient, write }, [search]) {
      const result = await getClient().customers.list({ search });
      for (const customer of result._embedded.customers) {
        write(`${customer.id} ${customer.firstName} ${customer.lastName} <${customer.email}> ${customer.status}`);
      }
      write(`${result.total} customer(s)`);
    },
  },
  {
    command: "customers:create",
    description: "Create a receive-only customer",
    usage: "<firstName> <lastName> <email>",
    async run({ getClient, write }, args) {
      requireArgs(args, 3, "customers:create <firstName> <lastName> <email>");
      const [firstName, lastName, email] = args;
      const location = await getClient().customers.create({
        firstName,
        lastName,
        email,
        type: "receive-only",
      });
      write(`Created ${location}`);
    },
  },
  {
    command: "documents:upload",
    description: "Upload an identity document for a customer",
    usage: "<customerId> <documentType> <file>",
    async run({ getClient, write }, args) {
      requireArgs(args, 3, "documents:upload <customerId> <documentType> <file>");
      const [customerId, documentType, file] = args;
      const data = await readFile(file);
      const location = await getClient().documents.upload(customerId, {
        documentType,
        document: {
          contentType: CONTENT_TYPES[extname(file).toLowerCase()] ?? "application/octet-stream",
          filename: basename(file),
          data,
        },
      });
      write(`Uploaded ${location}`);
    },
  },
  {
    command: "webhooks:list",
    description: "List webhook subscriptions",
    async run({ getClient, write }) {
      const result = await getClient().webhookSubscriptions.list();
      for (const subscription of result._embedded["webhook-subscriptions"]) {
        write(`${subscription.id} ${subscription.url}${subscription.paused ? " (paused)" : ""}`);
      }
    },
  },
  {
    command: "webhooks:delete",
    description: "Delete a webhook subscription",
    usage: "<subscriptionId>",
    async run({ getClient, write }, args) {
      requireArgs(args, 1, "webhooks:delete <subscriptionId>");
      await getClient().webhookSubscriptions.delete(args[0]);
      write(`Deleted ${args[0]}`);
    },
  },
];

export function createRegistry(): TaskRegistry {
  const registry = new TaskRegistry();
  for (const task of tasks) {
    registry.register(task);
  }
  return registry;
}

/**
 * Run one command line
 * @returns The process exit code
 */
export async function runCommand(
  registry: TaskRegistry,
  argv: string[],
  context: TaskContext,
): Promise<number> {
  const [command, ...args] = argv;

  if (!command || command === "help") {
    context.write("Commands:");
    registry.help().forEach((line) => context.write(line));
    return 0;
  }

  const task = registry.get(command);
  if (!task) {
    context.write(`Unknown command "${command}". Run "help" to list commands.`);
    return 1;
  }

  try {
    await task.run(context, args);
    return 0;
  } catch (error) {
    if (isApiException(error)) {
      context.write(error.message);
      if (error.error) {
        context.write(`${error.error.code}: ${error.error.message}`);
      }
      return 1;
    }
    context.write(error instanceof Error ? error.message : String(error));
    return 1;
  }
}
