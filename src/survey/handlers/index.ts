/**
 * Handler registry. The order of `DEFAULT_HANDLER_ORDER` is the order in
 * which one pass visits the page.
 */

import type { ControlKind } from '../../types/index.js';
import type { ControlHandler, ControlHandlerFactory, HandlerContext } from '../types.js';
import { CheckboxHandler } from './checkbox.handler.js';
import { RadioHandler } from './radio.handler.js';
import { SelectHandler } from './select.handler.js';
import { TextAreaHandler, TextInputHandler } from './text.handler.js';

export const DEFAULT_HANDLER_ORDER: readonly ControlKind[] = ['radio', 'checkbox', 'text', 'textarea', 'select'];

const HANDLER_FACTORIES: Record<ControlKind, ControlHandlerFactory> = {
  radio: (ctx) => new RadioHandler(ctx),
  checkbox: (ctx) => new CheckboxHandler(ctx),
  text: (ctx) => new TextInputHandler(ctx),
  textarea: (ctx) => new TextAreaHandler(ctx),
  select: (ctx) => new SelectHandler(ctx),
};

export function createDefaultHandlers(context: HandlerContext): ControlHandler[] {
  return DEFAULT_HANDLER_ORDER.map((kind) => HANDLER_FACTORIES[kind](context));
}

export { BaseControlHandler, multiChoiceCount } from './base.handler.js';
export type { ControlGroup, HandlerTally } from './base.handler.js';
export { RadioHandler, CheckboxHandler, SelectHandler, TextInputHandler, TextAreaHandler };
