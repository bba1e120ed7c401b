// Build a QueryBuilder from an ordered list of command-line style flags.
// Every flag names a builder predicate; two connectives look around them:
//   not       negates the predicate that follows it
//   or        joins the phrase before it with the (possibly negated) one after
// e.g. [from a, or, not seen] -> OR FROM "a" NOT SEEN

import { QueryArgumentError, QueryShapeError } from './errors.js'
import { query, QueryBuilder } from './query.js'

type Built = QueryBuilder | QueryArgumentError

const FLAG_PREDICATES = {
  all: (q: QueryBuilder) => q.all(),
  answered: (q: QueryBuilder) => q.answered(),
  deleted: (q: QueryBuilder) => q.deleted(),
  draft: (q: QueryBuilder) => q.draft(),
  flagged: (q: QueryBuilder) => q.flagged(),
  new: (q: QueryBuilder) => q.new(),
  old: (q: QueryBuilder) => q.old(),
  recent: (q: QueryBuilder) => q.recent(),
  seen: (q: QueryBuilder) => q.seen(),
  unanswered: (q: QueryBuilder) => q.unanswered(),
  undeleted: (q: QueryBuilder) => q.undeleted(),
  undraft: (q: QueryBuilder) => q.undraft(),
  unflagged: (q: QueryBuilder) => q.unflagged(),
  unseen: (q: QueryBuilder) => q.unseen(),
} satisfies Record<string, (q: QueryBuilder) => QueryBuilder>

const VALUE_PREDICATES = {
  bcc: (q: QueryBuilder, v: string): Built => q.bcc(v),
  body: (q: QueryBuilder, v: string): Built => q.body(v),
  cc: (q: QueryBuilder, v: string): Built => q.cc(v),
  contains: (q: QueryBuilder, v: string): Built => q.contains(v),
  from: (q: QueryBuilder, v: string): Built => q.from(v),
  gmailSearch: (q: QueryBuilder, v: string): Built => q.gmailSearch(v),
  keyword: (q: QueryBuilder, v: string): Built => q.keyword(v),
  subject: (q: QueryBuilder, v: string): Built => q.subject(v),
  text: (q: QueryBuilder, v: string): Built => q.text(v),
  to: (q: QueryBuilder, v: string): Built => q.to(v),
  unkeyword: (q: QueryBuilder, v: string): Built => q.unkeyword(v),
  uid: (q: QueryBuilder, v: string): Built => q.uid(v),
  before: (q: QueryBuilder, v: string): Built => q.before(v),
  on: (q: QueryBuilder, v: string): Built => q.on(v),
  since: (q: QueryBuilder, v: string): Built => q.since(v),
  sentBefore: (q: QueryBuilder, v: string): Built => q.sentBefore(v),
  sentOn: (q: QueryBuilder, v: string): Built => q.sentOn(v),
  sentSince: (q: QueryBuilder, v: string): Built => q.sentSince(v),
  larger: (q: QueryBuilder, v: string): Built => q.larger(parseBytes(v)),
  smaller: (q: QueryBuilder, v: string): Built => q.smaller(parseBytes(v)),
  header: (q: QueryBuilder, v: string): Built => {
    // "Field: value"
    const colon = v.indexOf(':')
    if (colon <= 0) return new QueryArgumentError({ predicate: 'HEADER', reason: `expected "Field: value", got "${v}"` })
    return q.header(v.slice(0, colon).trim(), v.slice(colon + 1).trim())
  },
} satisfies Record<string, (q: QueryBuilder, v: string) => Built>

export type FlagPredicateName = keyof typeof FLAG_PREDICATES
export type ValuePredicateName = keyof typeof VALUE_PREDICATES
export type QueryFlagName = FlagPredicateName | ValuePredicateName | 'or' | 'not'

export interface QueryFlag {
  name: QueryFlagName
  value?: string
}

function isFlagPredicate(name: string): name is FlagPredicateName {
  return Object.hasOwn(FLAG_PREDICATES, name)
}

function isValuePredicate(name: string): name is ValuePredicateName {
  return Object.hasOwn(VALUE_PREDICATES, name)
}

// Non-numeric input becomes NaN, which larger/smaller reject
function parseBytes(value: string): number {
  return /^\d+$/.test(value.trim()) ? Number(value.trim()) : NaN
}

/** Build the single phrase a predicate flag stands for. */
function buildPredicate(flag: QueryFlag): Built | QueryShapeError {
  const { name, value } = flag
  if (isFlagPredicate(name)) {
    if (value !== undefined) {
      return new QueryArgumentError({ predicate: name, reason: 'takes no value' })
    }
    return FLAG_PREDICATES[name](query())
  }
  if (isValuePredicate(name)) {
    if (value === undefined) {
      return new QueryArgumentError({ predicate: name, reason: 'missing value' })
    }
    return VALUE_PREDICATES[name](query(), value)
  }
  return new QueryShapeError({ reason: `"${name}" is not a predicate` })
}

export function buildQueryFromFlags(flags: readonly QueryFlag[]): QueryBuilder | QueryArgumentError | QueryShapeError {
  let acc = query()
  let negateNext = false
  let joinNext = false

  for (const flag of flags) {
    if (flag.name === 'not') {
      if (negateNext) return new QueryShapeError({ reason: '"not" cannot follow "not"' })
      negateNext = true
      continue
    }
    if (flag.name === 'or') {
      if (negateNext) return new QueryShapeError({ reason: '"or" cannot follow "not"' })
      if (joinNext) return new QueryShapeError({ reason: '"or" cannot follow "or"' })
      if (acc.isEmpty) return new QueryShapeError({ reason: '"or" needs a predicate before it' })
      joinNext = true
      continue
    }

    let phrase = buildPredicate(flag)
    if (phrase instanceof Error) return phrase
    if (negateNext) phrase = query().not(phrase)
    negateNext = false

    if (joinNext) {
      const previous = new QueryBuilder(acc.phrases.slice(-1))
      const joined = new QueryBuilder(acc.phrases.slice(0, -1)).or(previous, phrase)
      if (joined instanceof Error) return joined
      acc = joined
      joinNext = false
    } else {
      acc = acc.concat(phrase)
    }
  }

  if (negateNext) return new QueryShapeError({ reason: '"not" needs a predicate after it' })
  if (joinNext) return new QueryShapeError({ reason: '"or" needs a predicate after it' })
  return acc
}
