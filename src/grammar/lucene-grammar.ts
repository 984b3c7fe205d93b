import lucene from 'lucene';
import type { Node } from '../ast/nodes.js';
import {
  word,
  phrase,
  searchField,
  group,
  fieldGroup,
  orOperation,
  andOperation,
  not,
  unknownOperation,
  range,
  fuzzy,
  proximity,
  boost,
  plus,
  describeUnrecognized,
} from '../ast/nodes.js';
import type { GrammarParser, GrammarResult, GrammarError } from '../types.js';

const IMPLICIT_FIELD = '<implicit>';
const IMPLICIT_OPERATOR = '<implicit>';

type RawObject = Record<string, unknown>;

/** Operators left once negating forms (`AND NOT`, `NOT`, ...) are split off. */
type Connective = 'AND' | 'OR' | typeof IMPLICIT_OPERATOR;

interface Context {
  /** Field of the enclosing `field:( ... )` group; repeating it on a nested term adds no SearchField. */
  readonly scope: string | undefined;
  readonly source: string;
}

interface ChainLink {
  raw: unknown;
  negated: boolean;
}

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null;
}

function isTerm(raw: unknown): raw is RawObject {
  return isObject(raw) && ('term' in raw || 'term_min' in raw);
}

function optionalString(raw: RawObject, key: string): string | undefined {
  const value = raw[key];
  return typeof value === 'string' ? value : undefined;
}

/** Numeric modifier (`similarity`, `proximity`, `boost`) as text; the package emits null when absent. */
function modifierText(raw: RawObject, key: string): string | undefined {
  const value = raw[key];
  return typeof value === 'number' || typeof value === 'string' ? String(value) : undefined;
}

/**
 * Grammar backed by the `lucene` package. The package's tree (left/operator/right
 * with term leaves) is converted into the Node model; any exception it throws
 * becomes a failed result.
 */
export function createLuceneGrammar(): GrammarParser {
  return {
    parse(raw: string): GrammarResult {
      let tree: unknown;
      try {
        tree = lucene.parse(raw);
      } catch (err) {
        return { ok: false, error: toGrammarError(err) };
      }
      try {
        return { ok: true, node: fromLuceneAst(tree, raw) };
      } catch (err) {
        return { ok: false, error: toGrammarError(err) };
      }
    },
  };
}

function toGrammarError(err: unknown): GrammarError {
  const message = err instanceof Error ? err.message : String(err);
  // peg-generated errors carry location.start.offset
  const offset = startOffset(err, 'location');
  return offset !== undefined ? { message, offset } : { message };
}

function startOffset(raw: unknown, key: string): number | undefined {
  const location = isObject(raw) ? raw[key] : undefined;
  const start = isObject(location) ? location['start'] : undefined;
  const offset = isObject(start) ? start['offset'] : undefined;
  return typeof offset === 'number' ? offset : undefined;
}

/**
 * Converts the `lucene` package's output into a Node.
 * Throws on shapes that do not describe a complete expression.
 *
 * @param source - query text the tree was parsed from; needed to rejoin `term~2`,
 *   which the package splits into a fuzzy term and a separate number
 */
export function fromLuceneAst(raw: unknown, source = ''): Node {
  return convert(raw, { scope: undefined, source });
}

function convert(raw: unknown, ctx: Context): Node {
  if (!isObject(raw)) {
    throw new Error(`Unexpected grammar output: ${describeUnrecognized(raw)}`);
  }
  if (isTerm(raw)) {
    return termToNode(raw, ctx);
  }
  return expressionToNode(raw, ctx);
}

function fieldOf(raw: RawObject, scope: string | undefined): string | undefined {
  const field = optionalString(raw, 'field');
  return field === undefined || field === IMPLICIT_FIELD || field === scope ? undefined : field;
}

/** Term prefixes `-` and `!`, and the `NOT` / `!` start token of an expression. */
function isNegation(token: unknown): boolean {
  return token === '-' || token === '!' || token === 'NOT';
}

function termToNode(raw: RawObject, ctx: Context): Node {
  let node: Node;
  if ('term_min' in raw) {
    const [includeLow, includeHigh] = rangeInclusion(raw['inclusive']);
    node = range(String(raw['term_min']), String(raw['term_max']), includeLow, includeHigh);
  } else {
    const term = String(raw['term']);
    if (raw['quoted'] === true) {
      node = phrase(`"${term}"`);
      const distance = modifierText(raw, 'proximity');
      if (distance !== undefined) node = proximity(node, distance);
    } else if (raw['regex'] === true) {
      node = word(`/${term}/`);
    } else {
      node = word(term);
      const similarity = modifierText(raw, 'similarity');
      if (similarity !== undefined) node = fuzzy(node, similarity);
    }
  }

  const force = modifierText(raw, 'boost');
  if (force !== undefined) {
    node = boost(node, force);
  }
  const field = fieldOf(raw, ctx.scope);
  if (field !== undefined) {
    node = searchField(field, node);
  }

  const prefix = raw['prefix'];
  if (isNegation(prefix)) return not(node);
  if (prefix === '+') return plus(node);
  return node;
}

function rangeInclusion(inclusive: unknown): [boolean, boolean] {
  switch (inclusive) {
    case 'both':
    case true:
      return [true, true];
    case 'left':
      return [true, false];
    case 'right':
      return [false, true];
    default:
      return [false, false];
  }
}

function expressionToNode(raw: RawObject, ctx: Context): Node {
  const field = fieldOf(raw, ctx.scope);
  const inner: Context = { scope: field ?? ctx.scope, source: ctx.source };

  const { links, operators } = collectChain(raw);
  rejoinEditDistances(links, operators, ctx.source);

  const operands = links.map((link) => {
    const node = convert(link.raw, inner);
    return link.negated ? not(node) : node;
  });
  let node = foldChain(operands, operators);

  if (raw['parenthesized'] === true) {
    node = field !== undefined ? searchField(field, fieldGroup(node)) : group(node);
  } else if (field !== undefined) {
    node = searchField(field, node);
  }

  const force = modifierText(raw, 'boost');
  return force !== undefined ? boost(node, force) : node;
}

/**
 * The package nests every chain to the right (`a AND (b OR c)`) whatever the
 * operators; the unparenthesized spine is read back as a flat operand list so
 * precedence can be applied afterwards.
 */
function collectChain(root: RawObject): { links: ChainLink[]; operators: Connective[] } {
  const links: ChainLink[] = [];
  const operators: Connective[] = [];

  let current = root;
  let negated = isNegation(root['start']);
  for (;;) {
    const operator = optionalString(current, 'operator');
    if (current['left'] === undefined) {
      throw new Error(operator !== undefined ? `Dangling operator "${operator}"` : 'Empty query');
    }
    links.push({ raw: current['left'], negated });

    const right = current['right'];
    if (right === undefined) {
      if (operator !== undefined) throw new Error(`Dangling operator "${operator}"`);
      break;
    }

    const [connective, negatesRight] = splitOperator(operator ?? IMPLICIT_OPERATOR);
    operators.push(connective);

    if (continuesChain(right)) {
      current = right;
      negated = negatesRight || isNegation(right['start']);
      continue;
    }
    links.push({ raw: right, negated: negatesRight });
    break;
  }
  return { links, operators };
}

function continuesChain(raw: unknown): raw is RawObject {
  return isObject(raw)
    && !isTerm(raw)
    && raw['parenthesized'] !== true
    && raw['field'] === undefined;
}

function splitOperator(operator: string): [Connective, boolean] {
  switch (operator) {
    case 'OR':
    case '||':
      return ['OR', false];
    case 'AND':
    case '&&':
      return ['AND', false];
    case IMPLICIT_OPERATOR:
      return [IMPLICIT_OPERATOR, false];
    case 'OR NOT':
      return ['OR', true];
    case 'AND NOT':
      return ['AND', true];
    case 'NOT':
      return [IMPLICIT_OPERATOR, true];
    default:
      throw new Error(`Unsupported operator "${operator}"`);
  }
}

/**
 * The package only reads fractional fuzziness, so `foo~2` arrives as `foo~`
 * (similarity 0.5) followed by a bare term `2`. When the number sits directly
 * after the tilde in the source, the two are merged back into one fuzzy term.
 */
function rejoinEditDistances(links: ChainLink[], operators: Connective[], source: string): void {
  for (let i = 0; i < operators.length; i++) {
    const left = links[i];
    const right = links[i + 1];
    if (operators[i] !== IMPLICIT_OPERATOR || left === undefined || right === undefined || right.negated) continue;
    if (!isFuzzyTerm(left.raw) || !isEditDistance(right.raw, source)) continue;

    const merged: RawObject = { ...left.raw, similarity: right.raw['term'] };
    const force = modifierText(right.raw, 'boost');
    if (force !== undefined) merged['boost'] = force;

    links.splice(i, 2, { raw: merged, negated: left.negated });
    operators.splice(i, 1);
    i--;
  }
}

function isFuzzyTerm(raw: unknown): raw is RawObject {
  return isTerm(raw)
    && raw['quoted'] !== true
    && modifierText(raw, 'similarity') !== undefined
    && modifierText(raw, 'boost') === undefined;
}

function isEditDistance(raw: unknown, source: string): raw is RawObject {
  if (!isTerm(raw) || raw['quoted'] === true || raw['regex'] === true) return false;
  if (raw['prefix'] !== null && raw['prefix'] !== undefined) return false;
  if (fieldOf(raw, undefined) !== undefined || modifierText(raw, 'similarity') !== undefined) return false;
  const offset = startOffset(raw, 'termLocation');
  return /^\d+$/.test(String(raw['term'])) && offset !== undefined && source.charAt(offset - 1) === '~';
}

/**
 * Applies precedence to a flat operand list. AND binds tighter than OR. A
 * juxtaposition takes the operand on its left and everything to its right,
 * so `a b AND c` reads as `a (b AND c)` and `a AND b c` as `a AND (b c)`.
 */
function foldChain(operands: readonly Node[], operators: readonly Connective[]): Node {
  const implicitAt = operators.indexOf(IMPLICIT_OPERATOR);
  if (implicitAt !== -1) {
    const head = operands[implicitAt];
    if (head === undefined) throw new Error('Dangling operator "<implicit>"');
    const tail = foldChain(operands.slice(implicitAt + 1), operators.slice(implicitAt + 1));
    const joined = unknownOperation(head, ...spliceSame('UnknownOperation', tail));
    return foldChain([...operands.slice(0, implicitAt), joined], operators.slice(0, implicitAt));
  }

  const [first, ...rest] = operands;
  if (first === undefined) throw new Error('Empty query');

  const alternatives: Node[] = [];
  let conjunction: Node[] = [first];
  rest.forEach((operand, i) => {
    if (operators[i] === 'AND') {
      conjunction.push(operand);
    } else {
      alternatives.push(conjoin(conjunction));
      conjunction = [operand];
    }
  });
  alternatives.push(conjoin(conjunction));

  const [only] = alternatives;
  return alternatives.length === 1 && only !== undefined ? only : orOperation(...alternatives);
}

function conjoin(operands: Node[]): Node {
  const [only] = operands;
  return operands.length === 1 && only !== undefined ? only : andOperation(...operands);
}

/** Flattens a same-kind operation produced by the fold; groups are never spliced. */
function spliceSame(type: 'UnknownOperation', node: Node): Node[] {
  return node.type === type ? [...node.children] : [node];
}
