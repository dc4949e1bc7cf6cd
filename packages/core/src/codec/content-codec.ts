/**
 * Wire encoding for multimodal chat content.
 *
 * Content items are discriminated on `type`; the encoder always writes the
 * discriminant first, and the decoder dispatches on it, rejecting unknown
 * discriminants and payloads that lack their variant's required fields.
 *
 * ChatContent is untagged on the wire: a string encodes as a bare string and
 * a list encodes as an array, even with a single element. The decoder peeks at
 * the JSON shape to choose the variant before parsing items.
 */

import type {
  AudioFormat,
  ChatContent,
  ContentItem,
  ImageDetail,
} from '../types/content.js';
import { decodeFailure, isRecord, requireRecord, requireString, type JsonObject } from './json-guards.js';

const IMAGE_DETAILS: readonly ImageDetail[] = ['low', 'high', 'auto'];
const AUDIO_FORMATS: readonly AudioFormat[] = ['wav', 'mp3', 'm4a', 'ogg', 'flac', 'webm'];

function isImageDetail(value: unknown): value is ImageDetail {
  return IMAGE_DETAILS.some((d) => d === value);
}

function isAudioFormat(value: unknown): value is AudioFormat {
  return AUDIO_FORMATS.some((f) => f === value);
}

export function encodeContentItem(item: ContentItem): JsonObject {
  switch (item.type) {
    case 'text':
      return { type: 'text', text: item.text };
    case 'image_url': {
      const imageUrl: JsonObject = { url: item.image_url.url };
      if (item.image_url.detail !== undefined) {
        imageUrl.detail = item.image_url.detail;
      }
      return { type: 'image_url', image_url: imageUrl };
    }
    case 'input_audio':
      return {
        type: 'input_audio',
        input_audio: { data: item.input_audio.data, format: item.input_audio.format },
      };
    case 'file':
      return { type: 'file', file: { ...item.file } };
    case 'refusal':
      return { type: 'refusal', refusal: item.refusal };
  }
}

export function decodeContentItem(value: unknown): ContentItem {
  const obj = requireRecord(value, 'content item');
  const type = obj.type;
  if (typeof type !== 'string') {
    throw decodeFailure('content item', "missing 'type' discriminant");
  }

  switch (type) {
    case 'text':
      return { type: 'text', text: requireString(obj, 'text', 'text content') };

    case 'image_url': {
      const imageUrl = requireRecord(obj.image_url, 'image_url content');
      const url = requireString(imageUrl, 'url', 'image_url content');
      const detail = imageUrl.detail;
      if (detail === undefined || detail === null) {
        return { type: 'image_url', image_url: { url } };
      }
      if (!isImageDetail(detail)) {
        throw decodeFailure('image_url content', `unsupported detail '${String(detail)}'`);
      }
      return { type: 'image_url', image_url: { url, detail } };
    }

    case 'input_audio': {
      const audio = requireRecord(obj.input_audio, 'input_audio content');
      const data = requireString(audio, 'data', 'input_audio content');
      const format = audio.format;
      if (!isAudioFormat(format)) {
        throw decodeFailure('input_audio content', `unsupported format '${String(format)}'`);
      }
      return { type: 'input_audio', input_audio: { data, format } };
    }

    case 'file': {
      if (!isRecord(obj.file)) {
        throw decodeFailure('file content', "'file' must be an object");
      }
      return { type: 'file', file: { ...obj.file } };
    }

    case 'refusal':
      return { type: 'refusal', refusal: requireString(obj, 'refusal', 'refusal content') };

    default:
      throw decodeFailure('content item', `unknown type '${type}'`);
  }
}

export function encodeChatContent(content: ChatContent): string | JsonObject[] {
  if (typeof content === 'string') {
    return content;
  }
  return content.map(encodeContentItem);
}

export function decodeChatContent(value: unknown): ChatContent {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(decodeContentItem);
  }
  throw decodeFailure('message content', 'expected a string or an array of content items');
}
