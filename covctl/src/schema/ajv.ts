import Ajv2020 from "ajv/dist/2020.js";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T = unknown>(schema: object) => AjvValidateFn<T>;
  errorsText: (errors: unknown, options?: { dataVar?: string; separator?: string }) => string;
};

/** Shared ajv instance for config and tool-argument schemas. */
export function loadAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  return new AjvCtor({ allErrors: true, strict: true });
}
