export type ImageDetail = 'low' | 'high' | 'auto';

export type AudioFormat = 'wav' | 'mp3' | 'm4a' | 'ogg' | 'flac' | 'webm';

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ImageUrl {
  url: string;
  detail?: ImageDetail;
}

export interface ImageUrlContent {
  type: 'image_url';
  image_url: ImageUrl;
}

export interface InputAudio {
  /** Base64-encoded audio data */
  data: string;
  format: AudioFormat;
}

export interface InputAudioContent {
  type: 'input_audio';
  input_audio: InputAudio;
}

/**
 * Opaque file reference, e.g. `{ file_id }` or `{ file_data, filename }`.
 */
export type FileReference = Record<string, unknown>;

export interface FileContent {
  type: 'file';
  file: FileReference;
}

export interface RefusalContent {
  type: 'refusal';
  refusal: string;
}

export type ContentItem =
  | TextContent
  | ImageUrlContent
  | InputAudioContent
  | FileContent
  | RefusalContent;

export type ContentItemType = ContentItem['type'];

/**
 * Chat message content: a bare string, or an ordered list of content items.
 * The two shapes are kept distinct on the wire; a one-item list stays a list.
 */
export type ChatContent = string | ContentItem[];

export function textContent(text: string): TextContent {
  return { type: 'text', text };
}

export function imageUrlContent(url: string, detail?: ImageDetail): ImageUrlContent {
  return { type: 'image_url', image_url: detail === undefined ? { url } : { url, detail } };
}

export function inputAudioContent(data: string, format: AudioFormat): InputAudioContent {
  return { type: 'input_audio', input_audio: { data, format } };
}

export function fileContent(file: FileReference): FileContent {
  return { type: 'file', file };
}

export function refusalContent(refusal: string): RefusalContent {
  return { type: 'refusal', refusal };
}
