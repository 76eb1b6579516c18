import { z } from "zod";
import { SchemaError } from "./errors.js";
import { isReflectableClass, type ReflectableClass } from "./reflectable.js";
import { lookupInstance } from "./registry.js";
import type {
  Command,
  CommandFailure,
  CommandResult,
  FailureKind,
  FieldMap,
  LogFn,
  ParseResult,
  TextAccessor,
} from "./types.js";

export interface DispatcherOptions {
  /** Classes whose registries resolve the leading identifier, searched in order. */
  roots: readonly ReflectableClass[];
  /** Receives one line per failed command. Defaults to console.warn. */
  log?: LogFn;
}

const ROOT_CLASS_MESSAGE = "root must be a Reflectable class with declared fields";

const DispatcherOptionsSchema = z.object({
  roots: z
    .array(z.custom<ReflectableClass>(isReflectableClass, ROOT_CLASS_MESSAGE))
    .min(1, "at least one root class is required"),
  log: z.custom<LogFn>((value) => typeof value === "function", "log must be a function").optional(),
});

type Resolution = { ok: true; accessor: TextAccessor } | { ok: false; error: CommandFailure };

function failure(kind: FailureKind, message: string): { ok: false; error: CommandFailure } {
  return { ok: false, error: { kind, message } };
}

/**
 * Parse `<get|set> <id>.<member>[.<member>...][=<value>]`.
 * Tokens past the second are ignored; values cannot contain whitespace.
 */
export function parseCommand(text: string): ParseResult {
  const tokens = text.split(/\s+/).filter((token) => token.length > 0);
  const [op, target] = tokens;
  if (op === undefined || target === undefined) {
    return failure("MalformedCommand", `Malformed command: "${text}"`);
  }

  if (op === "get") {
    return { ok: true, command: { op, path: target } };
  }
  if (op === "set") {
    const eq = target.indexOf("=");
    if (eq < 0) {
      return failure("MalformedCommand", `Missing value in: "${text}"`);
    }
    return { ok: true, command: { op, path: target.slice(0, eq), value: target.slice(eq + 1) } };
  }
  return failure("MalformedCommand", `Unknown operation: ${op}`);
}

export class Dispatcher {
  readonly #roots: readonly ReflectableClass[];
  readonly #log: LogFn;

  constructor(options: DispatcherOptions) {
    const parsed = DispatcherOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new SchemaError(parsed.error.issues.map((issue) => issue.message).join("; "));
    }
    this.#roots = parsed.data.roots;
    this.#log = parsed.data.log ?? ((message) => console.warn(message));
  }

  execute(command: string): CommandResult {
    const parsed = parseCommand(command);
    if (!parsed.ok) return this.#report(parsed.error);
    return this.#run(parsed.command);
  }

  /** Value text on success, empty string on any failure. */
  parseAndExecute(command: string): string {
    const result = this.execute(command);
    return result.ok ? result.value : "";
  }

  get(path: string): CommandResult {
    return this.#run({ op: "get", path });
  }

  set(path: string, value: string): CommandResult {
    return this.#run({ op: "set", path, value });
  }

  #run(command: Command): CommandResult {
    const resolved = this.#resolve(command.path);
    if (!resolved.ok) return this.#report(resolved.error);

    const { accessor } = resolved;
    if (command.op === "get") {
      try {
        return { ok: true, value: accessor.getText() };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return this.#report({
          kind: "ConversionFailure",
          message: `Cannot read ${command.path}: ${reason}`,
        });
      }
    }
    if (!accessor.setText(command.value)) {
      return this.#report({
        kind: "ConversionFailure",
        message: `Cannot set ${command.path} to "${command.value}"`,
      });
    }
    return { ok: true, value: command.value };
  }

  #resolve(path: string): Resolution {
    const dot = path.indexOf(".");
    if (dot < 0) {
      return failure("MalformedCommand", `Missing member in path: ${path}`);
    }

    const id = path.slice(0, dot);
    const members = this.#lookup(id);
    if (!members) {
      return failure("ObjectNotFound", `Object not found: ${id}`);
    }

    const segments = path.slice(dot + 1).split(".");
    const leafName = segments.pop() ?? "";
    let current: FieldMap = members;
    let walked = id;

    for (const segment of segments) {
      walked = `${walked}.${segment}`;
      const accessor = current.get(segment);
      if (!accessor) {
        return failure("MemberNotFound", `Member not found: ${walked}`);
      }
      if (accessor.kind === "leaf") {
        return failure("NonNavigableMember", `Member is not navigable: ${walked}`);
      }
      const entered = accessor.enter();
      if (!entered) {
        return failure("MemberNotFound", `Member is empty: ${walked}`);
      }
      current = entered;
    }

    const accessor = current.get(leafName);
    if (!accessor) {
      return failure("MemberNotFound", `Member not found: ${path}`);
    }
    if (accessor.kind === "leaf") {
      return { ok: true, accessor };
    }
    if (accessor.empty) {
      return failure("MemberNotFound", `Member is empty: ${path}`);
    }
    if (accessor.text === undefined) {
      return failure("MemberNotFound", `Member has no text form: ${path}`);
    }
    return { ok: true, accessor: accessor.text };
  }

  #lookup(id: string): FieldMap | undefined {
    for (const root of this.#roots) {
      const instance = lookupInstance(root, id);
      if (instance) return root.fields.reflect(instance);
    }
    return undefined;
  }

  #report(error: CommandFailure): CommandResult {
    this.#log(error.message);
    return { ok: false, error };
  }
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  return new Dispatcher(options);
}
