/**
 * Shared Types for the Engagespot client
 */

export interface EngagespotSuccess {
  success: true;
  status: number;
  /** Response body, verbatim. */
  data: string;
}

interface FailureBase {
  success: false;
  error: string;
}

export interface EngagespotHttpFailure extends FailureBase {
  kind: 'http';
  status: number;
}

export interface EngagespotTransportFailure extends FailureBase {
  kind: 'transport';
}

export interface EngagespotSerializationFailure extends FailureBase {
  kind: 'serialization';
}

/**
 * Why a call failed:
 * - `http`: Engagespot answered with a non-2xx status; `error` is its response body.
 * - `transport`: no response (DNS, connect, TLS); `error` is the transport's message.
 * - `serialization`: the payload could not be encoded as JSON; nothing was sent.
 */
export type EngagespotFailure = EngagespotHttpFailure | EngagespotTransportFailure | EngagespotSerializationFailure;

export type EngagespotFailureKind = EngagespotFailure['kind'];

export type EngagespotResult = EngagespotSuccess | EngagespotFailure;

export type HttpMethod = 'POST' | 'PUT';
