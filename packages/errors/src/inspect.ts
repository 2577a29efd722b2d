function readProperty(value: unknown, property: string): unknown {
  if (typeof value !== "object" || value === null || !(property in value)) {
    return undefined;
  }
  return Reflect.get(value, property);
}

/** `code` of a Node / SDK error (ECONNRESET, ETIMEDOUT, ...), if present. */
export function errorCodeOf(error: unknown): string | undefined {
  const code = readProperty(error, "code");
  return typeof code === "string" ? code : undefined;
}

/** HTTP status carried by a client error (`status` or `statusCode`). */
export function httpStatusOf(error: unknown): number | undefined {
  for (const property of ["status", "statusCode"]) {
    const value = readProperty(error, property);
    if (typeof value === "number") return value;
  }
  const response = readProperty(error, "$metadata");
  const status = readProperty(response, "httpStatusCode");
  return typeof status === "number" ? status : undefined;
}

/** Class name recorded on a failed outcome. */
export function errorClassOf(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return "UnknownError";
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown error";
}

