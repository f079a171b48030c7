/** basic json primitive values */
export type JsonPrimitive = string | number | boolean | null;

/** json object with string keys */
export type JsonObject = { [key: string]: JsonValue };
/** json array containing any json values */
export type JsonArray = JsonValue[];
/** any valid json value */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/** json value that may also hold undefined members, dropped on serialisation */
export type JsonifibleValue =
  | JsonPrimitive
  | JsonifibleObject
  | JsonifibleValue[]
  | undefined;

/** jsonifible object with string keys */
export type JsonifibleObject = { [key: string]: JsonifibleValue };

/**
 * checks whether a parsed value is a json value
 * @param value value to inspect
 * @returns true for primitives, arrays and plain objects made of json values
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  ) {
    return true;
  }

  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }

  return isJsonObject(value);
}

/**
 * checks whether a parsed value is a json object
 * @param value value to inspect
 * @returns true for plain objects whose members are all json values
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(isJsonValue)
  );
}
