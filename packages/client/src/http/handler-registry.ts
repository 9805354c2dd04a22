/**
 * Handler Registry
 *
 * Maps a content-type tag to the handler that decodes responses for it.
 * Entries are replaced unconditionally and never removed; the registry lives
 * as long as the client that owns it. The base handler is fixed.
 */

import {
  BaseHandler,
  GeoJsonHandler,
  JsonHandler,
  RecordHandler,
  type HandlerResults,
  type HandlerTag,
  type ReplaceableHandlerTag,
  type ResponseHandler,
} from './handlers.js';

export type ReplaceableHandlers = {
  [K in ReplaceableHandlerTag]: ResponseHandler<HandlerResults[K]>;
};

export class HandlerRegistry {
  readonly base: BaseHandler;
  private readonly handlers: ReplaceableHandlers;

  constructor(overrides: Partial<ReplaceableHandlers> = {}) {
    this.base = new BaseHandler();
    this.handlers = {
      json: overrides.json ?? new JsonHandler(),
      geojson: overrides.geojson ?? new GeoJsonHandler(),
      record: overrides.record ?? new RecordHandler(),
    };
  }

  /**
   * Replace the handler for a tag. The handler is trusted to decode that
   * tag's responses.
   */
  setHandler<K extends ReplaceableHandlerTag>(tag: K, handler: ReplaceableHandlers[K]): void {
    this.handlers[tag] = handler;
  }

  /**
   * Registered handler for a tag, or the base handler for `base` and for any
   * tag this registry does not know
   */
  getHandler<K extends ReplaceableHandlerTag>(tag: K): ReplaceableHandlers[K];
  getHandler(tag: HandlerTag | string): ResponseHandler<HandlerResults[HandlerTag]>;
  getHandler(tag: HandlerTag | string): ResponseHandler<HandlerResults[HandlerTag]> {
    if (isReplaceableTag(tag)) {
      return this.handlers[tag];
    }
    return this.base;
  }
}

function isReplaceableTag(tag: string): tag is ReplaceableHandlerTag {
  return tag === 'json' || tag === 'geojson' || tag === 'record';
}
