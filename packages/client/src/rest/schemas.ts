import { looseObject, optional, string, unknown } from "valibot";

export const createdSchema = looseObject({ ID: string() });

export const tokenSchema = looseObject({ Token: string() });

export const licenseSchema = looseObject({
  Token: string(),
  DeviceID: optional(string()),
});

// Endpoints whose bodies are passed through untouched
export const jsonSchema = unknown();
