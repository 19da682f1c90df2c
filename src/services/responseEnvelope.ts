import type { FailureStatus, ResponseEnvelope } from "../types/actions.js";

export function buildSuccessEnvelope(
  action: string,
  response: string
): ResponseEnvelope {
  const envelope: ResponseEnvelope = {
    success: true,
    action,
    response,
    error: null,
    status_code: 200,
  };
  return Object.freeze(envelope);
}

export function buildErrorEnvelope(
  action: string,
  message: string,
  statusCode: FailureStatus = 400
): ResponseEnvelope {
  const envelope: ResponseEnvelope = {
    success: false,
    action,
    response: null,
    error: message,
    status_code: statusCode,
  };
  return Object.freeze(envelope);
}
