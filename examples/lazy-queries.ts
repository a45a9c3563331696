/**
 * Lazy Queries Demo
 *
 * Shows the three ways to read a document:
 * 1. parse() for a plain value tree
 * 2. LazyDocument lookups, pointers and wildcard paths
 * 3. A shared Parser whose older documents rehydrate on demand
 */

import { ByteBuffer, DocumentState, Parser, StateTransition, dump, parse, parseLazy } from '../src/index.js';

const sample = JSON.stringify({
  service: 'catalog',
  replicas: 3,
  regions: [
    { name: 'north', hosts: ['n1', 'n2'] },
    { name: 'south', hosts: ['s1'] }
  ],
  quota: 18446744073709551615n.toString()
});

function eagerDemo(): void {
  console.log('=== Eager parse ===');
  const value = parse(sample);
  console.log(dump(value));
}

function lazyDemo(): void {
  console.log('=== Lazy document ===');
  const doc = parseLazy(sample);

  console.log('replicas:', doc.get('replicas'));
  console.log('service:', doc.get('service'));
  console.log('second region:', doc.atPointer('/regions/1/name'));
  console.log('all hosts:', doc.atPathWithWildcard('$.regions[*].hosts[*]'));

  doc.atPathWithWildcard('$.regions.*.name', name => console.log('region', name));
}

function sharedParserDemo(): void {
  console.log('=== Shared parser ===');
  const parser = new Parser({ maxDepth: 64 });

  const first = parser.iterate(ByteBuffer.from('{"id":1}'));
  first.lifecycle.on('transition', (event: StateTransition) => {
    console.log(`first: ${event.from} -> ${event.to} (${event.reason})`);
  });

  const second = parser.iterate('{"id":2}');
  console.log('first is', first.state === DocumentState.Stale ? 'stale' : first.state);
  console.log('ids:', first.get('id'), second.get('id'));
}

eagerDemo();
lazyDemo();
sharedParserDemo();
