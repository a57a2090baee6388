import { z } from "zod";
import { InvalidNameError } from "./errors";
import { silentLogger, type Logger } from "./logger";

const OPTIONAL = "optional";

export const beanNameSchema = z
  .string()
  .min(1, "cannot use empty name")
  .superRefine((name, ctx) => {
    if (name.includes("`")) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid name ${JSON.stringify(name)}: names cannot contain backquotes` });
    }
  });

/** Throws InvalidNameError carrying the first schema issue. */
export function validateBeanName(name: string): string {
  const parsed = beanNameSchema.safeParse(name);
  if (!parsed.success) throw new InvalidNameError(parsed.error.issues[0]?.message ?? "invalid name", name);
  return parsed.data;
}

export type DependencyTag = { name: string; optional: boolean };

/** Parses `name` or `name,optional`. */
export function parseTag(tag: string): DependencyTag {
  const [head = "", ...modifiers] = tag.split(",").map(part => part.trim());
  const name = validateBeanName(head);
  let optional = false;
  for (const m of modifiers) {
    if (m !== OPTIONAL) throw new InvalidNameError(`unknown modifier "${m}" in dependency tag ${JSON.stringify(tag)}`, tag);
    optional = true;
  }
  return { name, optional };
}

// -------- container options --------
export type ContainerSettings = { logger: Logger };
export type ContainerOption = (settings: ContainerSettings) => void;

export const defaultSettings = (): ContainerSettings => ({ logger: silentLogger });

export function withLogger(logger: Logger): ContainerOption {
  return settings => { settings.logger = logger; };
}

// -------- register options --------
export type RegisterOptions = { name: string };
export type RegisterOption = (opts: RegisterOptions) => void;

/**
 * Sets the key a bean is registered under.
 *
 * @example
 * keeper.register(new Connection(), named("ro"));
 * keeper.register(new Connection(), named("rw"));
 */
export function named(name: string): RegisterOption {
  return opts => { opts.name = name; };
}
