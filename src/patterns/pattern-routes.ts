/** Path segment of every pattern under /api/patterns/<name>/{demo,test}. */
export const PATTERN_ROUTES = [
  'singleton',
  'factory-method',
  'abstract-factory',
  'builder',
  'adapter',
  'command',
  'decorator',
  'strategy',
  'strategy-advanced',
  'observer',
  'facade',
  'repository',
  'mediator',
  'state',
  'prototype',
  'chain-of-responsibility',
] as const;
