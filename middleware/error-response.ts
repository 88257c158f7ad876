import type { Context } from "hono";
import axios from "axios";
import {
  ConfigError,
  KaiterraApiError,
  ResponseFormatError,
  TimestampFormatError,
} from "../services/errors";

type ErrorStatus = 400 | 404 | 500 | 502 | 504;

type ErrorDetails = string | string[] | { status: number; body: string };

export interface ErrorBody {
  error: string;
  details?: ErrorDetails;
}

export function describeError(error: unknown): { status: ErrorStatus; body: ErrorBody } {
  if (error instanceof KaiterraApiError) {
    if (error.status === 404) {
      return { status: 404, body: { error: "Device not found" } };
    }
    return {
      status: 502,
      body: {
        error: "Kaiterra API request failed",
        details: { status: error.status, body: error.responseBody },
      },
    };
  }
  if (error instanceof ResponseFormatError) {
    return { status: 502, body: { error: error.message, details: error.issues } };
  }
  if (error instanceof TimestampFormatError) {
    return { status: 502, body: { error: error.message } };
  }
  if (error instanceof SyntaxError) {
    return { status: 502, body: { error: "Kaiterra API returned invalid JSON" } };
  }
  if (error instanceof ConfigError) {
    return { status: 500, body: { error: error.message, details: error.fields } };
  }
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return { status: 504, body: { error: "Kaiterra API timed out" } };
    }
    return {
      status: 502,
      body: { error: "Failed to reach Kaiterra API", details: error.message },
    };
  }
  return {
    status: 500,
    body: {
      error: "Internal Server Error",
      details: error instanceof Error ? error.message : String(error),
    },
  };
}

export function respondWithError(c: Context, error: unknown, what: string) {
  const { status, body } = describeError(error);
  console.error(`Error ${what}:`, error instanceof Error ? error.message : error);
  return c.json(body, status);
}
