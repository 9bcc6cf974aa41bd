/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Conversion between A2A parts and Google GenAI parts.
 */

import type {Part as GenAIPart} from '@google/genai';

import {logger} from '../../utils/logger.js';
import type {
  A2ADataPart,
  A2AFileWithBytes,
  A2AFileWithUri,
  A2APart,
  A2ATextPart,
} from '../types.js';
import {getRelayMetadataKey, isRecord} from './utils.js';

export const A2A_DATA_PART_METADATA_TYPE_KEY = 'type';
export const A2A_DATA_PART_METADATA_TYPE_FUNCTION_CALL = 'function_call';
export const A2A_DATA_PART_METADATA_TYPE_FUNCTION_RESPONSE = 'function_response';

export const A2A_DATA_PART_START_TAG = '<a2a_datapart_json>';
export const A2A_DATA_PART_END_TAG = '</a2a_datapart_json>';

export type A2APartToGenAIPartConverter = (
  a2aPart: A2APart
) => GenAIPart | undefined;

export type GenAIPartToA2APartConverter = (
  part: GenAIPart
) => A2APart | undefined;

function isFileWithUri(
  file: A2AFileWithUri | A2AFileWithBytes
): file is A2AFileWithUri {
  return 'uri' in file;
}

function dataPartType(part: A2ADataPart): unknown {
  return part.metadata?.[getRelayMetadataKey(A2A_DATA_PART_METADATA_TYPE_KEY)];
}

/**
 * Converts an A2A part to a GenAI part for the agent runner.
 *
 * Data parts that are not tool traffic reach the model as tagged JSON text.
 */
export function convertA2aPartToGenaiPart(
  a2aPart: A2APart
): GenAIPart | undefined {
  switch (a2aPart.kind) {
    case 'text':
      return {text: a2aPart.text};

    case 'file':
      if (isFileWithUri(a2aPart.file)) {
        return {
          fileData: {
            fileUri: a2aPart.file.uri,
            mimeType: a2aPart.file.mimeType,
          },
        };
      }
      return {
        inlineData: {
          data: a2aPart.file.bytes,
          mimeType: a2aPart.file.mimeType,
        },
      };

    case 'data': {
      const {name, id} = a2aPart.data;
      const type = dataPartType(a2aPart);
      if (
        type === A2A_DATA_PART_METADATA_TYPE_FUNCTION_CALL &&
        typeof name === 'string'
      ) {
        return {
          functionCall: {
            name,
            args: isRecord(a2aPart.data.args) ? a2aPart.data.args : {},
            id: typeof id === 'string' ? id : undefined,
          },
        };
      }
      if (
        type === A2A_DATA_PART_METADATA_TYPE_FUNCTION_RESPONSE &&
        typeof name === 'string'
      ) {
        return {
          functionResponse: {
            name,
            response: isRecord(a2aPart.data.response)
              ? a2aPart.data.response
              : {},
            id: typeof id === 'string' ? id : undefined,
          },
        };
      }
      return {
        text: `${A2A_DATA_PART_START_TAG}${JSON.stringify(a2aPart.data)}${A2A_DATA_PART_END_TAG}`,
      };
    }

    default:
      logger.warn(
        `Cannot convert unsupported part type for A2A part: ${JSON.stringify(a2aPart)}`
      );
      return undefined;
  }
}

/**
 * Converts a GenAI part produced by the agent into an A2A part.
 *
 * Returns undefined for parts that have no A2A counterpart.
 */
export function convertGenaiPartToA2aPart(
  part: GenAIPart
): A2APart | undefined {
  if (part.text !== undefined) {
    const textPart: A2ATextPart = {kind: 'text', text: part.text};
    if (part.thought) {
      textPart.metadata = {[getRelayMetadataKey('thought')]: true};
    }
    return textPart;
  }

  if (part.fileData) {
    return {
      kind: 'file',
      file: {
        uri: part.fileData.fileUri ?? '',
        mimeType: part.fileData.mimeType,
      },
    };
  }

  if (part.inlineData) {
    return {
      kind: 'file',
      file: {
        bytes: part.inlineData.data ?? '',
        mimeType: part.inlineData.mimeType,
      },
    };
  }

  if (part.functionCall) {
    return {
      kind: 'data',
      data: {
        name: part.functionCall.name,
        args: part.functionCall.args ?? {},
        id: part.functionCall.id,
      },
      metadata: {
        [getRelayMetadataKey(A2A_DATA_PART_METADATA_TYPE_KEY)]:
          A2A_DATA_PART_METADATA_TYPE_FUNCTION_CALL,
      },
    };
  }

  if (part.functionResponse) {
    return {
      kind: 'data',
      data: {
        name: part.functionResponse.name,
        response: part.functionResponse.response ?? {},
        id: part.functionResponse.id,
      },
      metadata: {
        [getRelayMetadataKey(A2A_DATA_PART_METADATA_TYPE_KEY)]:
          A2A_DATA_PART_METADATA_TYPE_FUNCTION_RESPONSE,
      },
    };
  }

  logger.warn(`Cannot convert unsupported GenAI part: ${JSON.stringify(part)}`);
  return undefined;
}

/**
 * Concatenates the text parts of a message, ignoring thoughts.
 */
export function extractText(parts: readonly A2APart[]): string {
  return parts
    .filter(
      (part): part is A2ATextPart =>
        part.kind === 'text' &&
        part.metadata?.[getRelayMetadataKey('thought')] !== true
    )
    .map((part) => part.text)
    .join('');
}
