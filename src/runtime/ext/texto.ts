/**
 * Texto: text built-ins
 *
 * Texts are immutable; every function returns a new value. Lengths and
 * positions count characters, not UTF-16 units.
 *
 * @internal
 */

import { createNative, type NativeCallable } from '../core/callable.js';
import { ok, type Result } from '../core/signals.js';
import { createList, type TendaValue } from '../core/values.js';
import { invalidArgument, textArg } from './arguments.js';

function native(
  name: string,
  arity: number,
  fn: NativeCallable['fn']
): [string, NativeCallable] {
  return [name, createNative(`Texto.${name}`, arity, fn)];
}

/** Native over text arguments only */
function textNative(
  name: string,
  arity: number,
  fn: (texts: string[]) => Result<TendaValue>
): [string, NativeCallable] {
  return native(name, arity, (args) => {
    const texts: string[] = [];
    for (let i = 0; i < arity; i++) {
      const text = textArg(args, i, `Texto.${name}`);
      if (!text.ok) return text;
      texts.push(text.value);
    }
    return fn(texts);
  });
}

export function createTextoFunctions(): [string, NativeCallable][] {
  return [
    textNative('tamanho', 1, ([text = '']) => ok([...text].length)),
    textNative('vazio', 1, ([text = '']) => ok(text.length === 0)),
    textNative('para_maiúsculas', 1, ([text = '']) => ok(text.toUpperCase())),
    textNative('para_minúsculas', 1, ([text = '']) => ok(text.toLowerCase())),
    textNative('contém', 2, ([text = '', part = '']) => ok(text.includes(part))),
    textNative('começa_com', 2, ([text = '', prefix = '']) =>
      ok(text.startsWith(prefix))
    ),
    textNative('termina_com', 2, ([text = '', suffix = '']) =>
      ok(text.endsWith(suffix))
    ),
    textNative('apare', 1, ([text = '']) => ok(text.trim())),
    textNative('para_lista', 1, ([text = '']) => ok(createList([...text]))),

    /** An empty separator splits into characters */
    textNative('divida', 2, ([text = '', separator = '']) => {
      const parts = separator === '' ? [...text] : text.split(separator);
      return ok(createList(parts));
    }),

    textNative('substitua', 3, ([text = '', from = '', to = '']) => {
      if (from === '') {
        return invalidArgument('Texto.substitua', 'o texto procurado está vazio');
      }
      return ok(text.split(from).join(to));
    }),
  ];
}
