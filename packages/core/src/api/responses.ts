/**
 * Responses endpoints. State legality (e.g. cancelling a finished response)
 * is decided by the server; the client only reports accepted vs rejected.
 */

import type { ClientConfig } from '../client/config.js';
import { dispatch, dispatchEmpty } from '../client/dispatcher.js';
import { decodeResponse } from '../codec/decoders.js';
import { CloudAIError } from '../errors.js';
import type { CreateResponseRequest, GetResponseQuery, Response } from '../types/response.js';
import { agentPath, idSegment } from './paths.js';

function responsePath(agentAccessId: string, responseId?: string): string {
  return responseId === undefined
    ? agentPath(agentAccessId, 'v1', 'responses')
    : agentPath(agentAccessId, 'v1', 'responses', idSegment(responseId));
}

export function createResponse(config: ClientConfig, agentAccessId: string, request: CreateResponseRequest): Promise<Response> {
  return dispatch(config, {
    method: 'POST',
    path: responsePath(agentAccessId),
    auth: true,
    body: request,
  }, decodeResponse);
}

export function getResponse(
  config: ClientConfig,
  agentAccessId: string,
  responseId: string,
  query?: GetResponseQuery,
): Promise<Response> {
  return dispatch(config, {
    method: 'GET',
    path: responsePath(agentAccessId, responseId),
    auth: true,
    query,
  }, decodeResponse);
}

/**
 * Any 2xx, including 204 No Content, counts as deleted.
 */
export function deleteResponse(config: ClientConfig, agentAccessId: string, responseId: string): Promise<void> {
  return dispatchEmpty(config, {
    method: 'DELETE',
    path: responsePath(agentAccessId, responseId),
    auth: true,
  });
}

export function cancelResponse(config: ClientConfig, agentAccessId: string, responseId: string): Promise<Response> {
  return dispatch(config, {
    method: 'POST',
    path: `${responsePath(agentAccessId, responseId)}/cancel`,
    auth: true,
  }, decodeResponse);
}

/**
 * Throw a `cancelled` error for a response the server reports as cancelled;
 * otherwise return it unchanged.
 */
export function throwIfCancelled(response: Response): Response {
  if (response.status === 'cancelled') {
    throw new CloudAIError('cancelled', `Response ${response.id} was cancelled`);
  }
  return response;
}
