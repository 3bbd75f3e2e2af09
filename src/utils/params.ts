import { Request } from "express";
import { z } from "zod";
import { ValidationError } from "./errors";

const INTEGER = /^-?\d+$/;

/** Runs a boundary schema; the first issue becomes a 422. */
export const parseWith = <S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
): z.output<S> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? "Invalid input");
  }
  return result.data;
};

/**
 * Reads a scalar input from the query string, falling back to the JSON body.
 * Repeated query keys (`?name=a&name=b`) are rejected.
 */
export const readField = (req: Request, field: string): unknown => {
  const fromQuery = req.query[field];
  if (fromQuery !== undefined) {
    if (typeof fromQuery !== "string") {
      throw new ValidationError(`${field} must be a single value`);
    }
    return fromQuery;
  }
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && field in body) {
    return Reflect.get(body, field);
  }
  return undefined;
};

export const stringField = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    });

// "12" -> 12; query and path values only ever arrive as strings
export const integerField = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be an integer`,
    })
    .regex(INTEGER, `${field} must be an integer`)
    .transform(Number);

export const numberField = (field: string) =>
  z.preprocess(
    (value) =>
      typeof value === "string" && value.trim() !== "" ? Number(value) : value,
    z
      .number({
        required_error: `${field} is required`,
        invalid_type_error: `${field} must be a number`,
      })
      .finite(`${field} must be a number`),
  );

export const requiredString = (value: unknown, field: string): string =>
  parseWith(stringField(field), value);

export const requiredInt = (value: unknown, field: string): number =>
  parseWith(integerField(field), value);

export const requiredNumber = (value: unknown, field: string): number =>
  parseWith(numberField(field), value);
