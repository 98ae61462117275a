/** Client operation identifiers for logging, spans and errors. */
export const Operation = {
  Options: 'options',
  Get: 'get',
  Gets: 'gets',
  GetMany: 'get_many',
  GetsMany: 'gets_many',
  Set: 'set',
  SetMany: 'set_many',
  Add: 'add',
  Replace: 'replace',
  Append: 'append',
  Prepend: 'prepend',
  Cas: 'cas',
  Delete: 'delete',
  DeleteMany: 'delete_many',
  Incr: 'incr',
  Decr: 'decr',
  Touch: 'touch',
  Stats: 'stats',
  FlushAll: 'flush_all',
  Quit: 'quit',
} as const;

/** Union of operation identifiers. */
export type Operation = (typeof Operation)[keyof typeof Operation];
