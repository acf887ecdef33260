import type { ApiResponse } from "@picks/types";

/**
 * Success envelope
 */
export function envelope<T>(requestId: string, data: T): ApiResponse<T> {
  return {
    success: true,
    data,
    timestamp: new Date().toISOString(),
    requestId,
  };
}
