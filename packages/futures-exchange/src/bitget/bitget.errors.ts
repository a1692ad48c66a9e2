export type BitgetErrorOptions = {
  endpoint: string;
  method: string;
  status?: number;
  code?: string;
  responseBody?: unknown;
};

export class BitgetApiError extends Error {
  constructor(
    message: string,
    public readonly options: BitgetErrorOptions
  ) {
    super(message);
    this.name = "BitgetApiError";
  }
}

export class BitgetAuthError extends BitgetApiError {
  constructor(message: string, options: BitgetErrorOptions) {
    super(message, options);
    this.name = "BitgetAuthError";
  }
}

export class BitgetRateLimitError extends BitgetApiError {
  constructor(message: string, options: BitgetErrorOptions) {
    super(message, options);
    this.name = "BitgetRateLimitError";
  }
}

export class BitgetMaintenanceError extends BitgetApiError {
  constructor(message: string, options: BitgetErrorOptions) {
    super(message, options);
    this.name = "BitgetMaintenanceError";
  }
}

export class BitgetInvalidParamsError extends BitgetApiError {
  constructor(message: string, options: BitgetErrorOptions) {
    super(message, options);
    this.name = "BitgetInvalidParamsError";
  }
}

// Network failure, timeout or an unreadable response body.
export class BitgetTransportError extends BitgetApiError {
  constructor(message: string, options: BitgetErrorOptions) {
    super(message, options);
    this.name = "BitgetTransportError";
  }
}

function normalize(value: unknown): string {
  return String(value ?? "").trim().toLowerCase();
}

export function toBitgetError(params: {
  endpoint: string;
  method: string;
  status?: number;
  code?: string;
  message?: string;
  responseBody?: unknown;
}): BitgetApiError {
  const code = String(params.code ?? params.status ?? "");
  const message = params.message ?? "Bitget request failed";
  const normalized = normalize(message);
  const options: BitgetErrorOptions = {
    endpoint: params.endpoint,
    method: params.method,
    status: params.status,
    code: params.code,
    responseBody: params.responseBody
  };

  if (code === "40001" || code === "40002" || code === "40003" || code === "40006" || code === "401") {
    return new BitgetAuthError(message, options);
  }

  if (code === "429" || code === "40015" || normalized.includes("too many")) {
    return new BitgetRateLimitError(message, options);
  }

  if (
    code === "50000" ||
    (params.status !== undefined && params.status >= 500) ||
    normalized.includes("maintenance")
  ) {
    return new BitgetMaintenanceError(message, options);
  }

  if (code.startsWith("4") || normalized.includes("param") || normalized.includes("invalid")) {
    return new BitgetInvalidParamsError(message, options);
  }

  return new BitgetApiError(message, options);
}

export function isTransientBitgetError(error: unknown): boolean {
  return (
    error instanceof BitgetTransportError ||
    error instanceof BitgetRateLimitError ||
    error instanceof BitgetMaintenanceError
  );
}
