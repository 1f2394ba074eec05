import { describe, it, expect } from 'vitest';
import { applyResultBound, classifyQuery, isReadOnlyQuery } from '../query-safety.js';

describe('classifyQuery', () => {
  it.each([
    ['MATCH (n) RETURN n'],
    ['MATCH (p:Person)-[:KNOWS]->(f) RETURN p.name, count(f) ORDER BY p.name'],
    ['CALL db.labels()'],
  ])('accepts %s', query => {
    expect(classifyQuery(query)).toEqual({ safe: true });
  });

  it.each([
    ['match (n) detach delete n', 'DELETE'],
    ['CREATE (n:Person {name: "x"})', 'CREATE'],
    ['MATCH (n) Merge (m:Copy)', 'MERGE'],
    ['MATCH (n) SET n.x = 1', 'SET'],
    ['DROP INDEX foo', 'DROP'],
    ['MATCH (n) REMOVE n.x', 'REMOVE'],
    ['CALL dbms.security.listUsers()', 'CALL DBMS'],
    ['LOAD\n  CSV FROM "file:///x.csv" AS row RETURN row', 'LOAD CSV'],
  ])('refuses %s', (query, keyword) => {
    expect(classifyQuery(query)).toEqual({ safe: false, keyword });
  });

  it('matches keywords inside identifiers and strings', () => {
    // Conservative: "dataset" contains SET, "created" contains CREATE
    expect(isReadOnlyQuery('MATCH (n) RETURN n.dataset')).toBe(false);
    expect(isReadOnlyQuery("MATCH (n) WHERE n.status = 'created' RETURN n")).toBe(false);
  });
});

describe('applyResultBound', () => {
  it('appends the default limit to an unbounded query', () => {
    expect(applyResultBound('MATCH (n) RETURN n')).toBe('MATCH (n) RETURN n\nLIMIT 25');
  });

  it('leaves a query with a limit unchanged', () => {
    expect(applyResultBound('MATCH (n) RETURN n LIMIT 5')).toBe('MATCH (n) RETURN n LIMIT 5');
    expect(applyResultBound('match (n) return n limit 500')).toBe('match (n) return n limit 500');
  });

  it('drops trailing whitespace and semicolons before appending', () => {
    expect(applyResultBound('MATCH (n) RETURN n ;\n', 10)).toBe('MATCH (n) RETURN n\nLIMIT 10');
  });
});
