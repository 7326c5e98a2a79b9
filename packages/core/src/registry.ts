import { z } from "zod";
import { AppError, type AppErrorType } from "./app-error.js";
import { ErrorCode, isErrorCode, type ErrorCodeType } from "./error-code.js";
import { RegistryError } from "./library-errors.js";

/**
 * Zod schemas bound to the codec doing the decoding, for constructor
 * parameters that hold an ErrorCode or another AppError.
 */
export interface NestedSchemas {
  readonly code: z.ZodType<ErrorCode, z.ZodTypeDef, unknown>;
  readonly error: z.ZodType<AppError, z.ZodTypeDef, unknown>;
}

/**
 * Outcome of binding a payload to one constructor candidate.
 */
export type PreparedConstruction<E> =
  | { readonly ok: true; readonly invoke: () => E }
  | { readonly ok: false; readonly reason: string };

/**
 * One way of rebuilding a variant from decoded fields. A variant may offer
 * several; the codec tries the one with the most parameters first.
 */
export interface ErrorConstructor<E extends AppError = AppError> {
  readonly parameters: readonly string[];
  prepare(args: Readonly<Record<string, unknown>>): PreparedConstruction<E>;
}

export type ConstructorArgs<S extends z.ZodRawShape> = z.objectOutputType<
  S,
  z.ZodTypeAny,
  "strip"
>;

/**
 * Declare a constructor candidate.
 *
 * `shape` maps parameter names to the schema their field must satisfy; a
 * schema with `.default()` (or `.optional()`) gives the parameter a declared
 * default. `create` receives the parsed, typed arguments.
 *
 * @example
 * ```typescript
 * errorConstructor(
 *   { description: z.string(), customerId: z.string() },
 *   (args) => new CustomerNotFoundError(args.description, args.customerId)
 * );
 * ```
 */
export function errorConstructor<S extends z.ZodRawShape, E extends AppError>(
  shape: S,
  create: (args: ConstructorArgs<S>) => E
): ErrorConstructor<E> {
  const schema = z.object(shape);
  return {
    parameters: Object.keys(shape),
    prepare(args) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        const reason = parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join(", ");
        return { ok: false, reason };
      }
      const data = parsed.data;
      return { ok: true, invoke: () => create(data) };
    },
  };
}

export interface ErrorCodeEntry {
  readonly kind: "code";
  readonly tag: string;
  readonly instance: ErrorCode;
}

export interface ErrorTypeEntry {
  readonly kind: "error";
  readonly tag: string;
  readonly type: AppErrorType;
  readonly exclude: ReadonlySet<string>;
  readonly constructors: (
    schemas: NestedSchemas
  ) => readonly ErrorConstructor[];
}

export type RegistryEntry = ErrorCodeEntry | ErrorTypeEntry;

export interface ErrorCodeOptions {
  /** Wire tag; defaults to the class name. */
  readonly tag?: string;
}

export interface ErrorTypeOptions<E extends AppError> {
  /** Wire tag; defaults to the class name. */
  readonly tag?: string;
  /** Instance fields never written by the encoder; list private state here. */
  readonly exclude?: readonly string[];
  readonly constructors: (
    schemas: NestedSchemas
  ) => readonly ErrorConstructor<E>[];
}

/**
 * Table from wire tag to AppError variant or canonical ErrorCode singleton.
 *
 * Replaces lookup of runtime types by name: only what has been registered can
 * be decoded, and any module can register its own variants without touching
 * this one. Entries are written once, normally at module load, and only read
 * afterwards.
 */
export class TypeRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly codeTags = new Map<ErrorCode, string>();
  private readonly errorTags = new Map<unknown, string>();

  /**
   * Register a code class by its `instance` singleton.
   *
   * @returns the canonical instance
   */
  registerErrorCode<C extends ErrorCode>(
    type: ErrorCodeType<C>,
    options: ErrorCodeOptions = {}
  ): C {
    const instance = type.instance;
    if (!isErrorCode(instance)) {
      throw new RegistryError(
        `'${type.name}.instance' is not an ErrorCode singleton`
      );
    }

    const tag = this.checkTag(options.tag ?? type.name);
    const existing = this.codeTags.get(instance);
    if (existing !== undefined) {
      if (existing === tag) return instance;
      throw new RegistryError(
        `ErrorCode '${instance.name}' is already registered as '${existing}'`
      );
    }
    this.claim(tag);

    this.entries.set(tag, { kind: "code", tag, instance });
    this.codeTags.set(instance, tag);
    return instance;
  }

  registerErrorType<E extends AppError>(
    type: AppErrorType<E>,
    options: ErrorTypeOptions<E>
  ): void {
    if (
      type.prototype !== AppError.prototype &&
      !(type.prototype instanceof AppError)
    ) {
      throw new RegistryError(`'${type.name}' does not extend AppError`);
    }

    const tag = this.checkTag(options.tag ?? type.name);
    const existing = this.errorTags.get(type);
    if (existing !== undefined) {
      if (existing === tag) return;
      throw new RegistryError(
        `Error type '${type.name}' is already registered as '${existing}'`
      );
    }
    this.claim(tag);

    this.entries.set(tag, {
      kind: "error",
      tag,
      type,
      exclude: new Set(options.exclude ?? []),
      constructors: options.constructors,
    });
    this.errorTags.set(type, tag);
  }

  resolve(tag: string): RegistryEntry | undefined {
    return this.entries.get(tag);
  }

  tagOfCode(code: ErrorCode): string | undefined {
    return this.codeTags.get(code);
  }

  /**
   * Tag of the error's exact runtime class; a registered base class does not
   * stand in for an unregistered subclass.
   */
  tagOfError(error: AppError): string | undefined {
    return this.errorTags.get(error.constructor);
  }

  exclusionsOf(error: AppError): ReadonlySet<string> {
    const tag = this.tagOfError(error);
    const entry = tag === undefined ? undefined : this.entries.get(tag);
    return entry?.kind === "error" ? entry.exclude : new Set();
  }

  tags(): string[] {
    return [...this.entries.keys()];
  }

  private checkTag(tag: string): string {
    if (tag.trim() === "") {
      throw new RegistryError("Registry tags must not be empty");
    }
    return tag;
  }

  private claim(tag: string): void {
    if (this.entries.has(tag)) {
      throw new RegistryError(`Tag '${tag}' is already registered`);
    }
  }
}

/**
 * Process-wide registry. Built-in variants register themselves here when
 * their module loads.
 */
export const defaultRegistry = new TypeRegistry();

export function registerErrorCode<C extends ErrorCode>(
  type: ErrorCodeType<C>,
  options?: ErrorCodeOptions
): C {
  return defaultRegistry.registerErrorCode(type, options);
}

export function registerErrorType<E extends AppError>(
  type: AppErrorType<E>,
  options: ErrorTypeOptions<E>
): void {
  defaultRegistry.registerErrorType(type, options);
}
