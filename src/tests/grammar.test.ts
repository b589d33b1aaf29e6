import * as test from 'node:test';
import * as assert from 'node:assert';
import {
  candidateBody,
  findCandidates,
  segmentsToParts,
  splitSegments,
  stripFallbackText
} from '../grammar.js';

const { describe, it } = test;

describe('splitSegments', () => {

  it('should split type and fqn', () => {
    assert.deepStrictEqual(splitSegments('table/db.t1'), ['table', 'db.t1']);
  });

  it('should split all five segments', () => {
    assert.deepStrictEqual(
      splitSegments('table/db.t1/columns/comment/description'),
      ['table', 'db.t1', 'columns', 'comment', 'description']
    );
  });

  it('should keep the remainder in the last segment', () => {
    assert.deepStrictEqual(splitSegments('a/b/c/d/e/f'), ['a', 'b', 'c', 'd', 'e/f']);
  });

  it('should drop trailing empty segments', () => {
    assert.deepStrictEqual(splitSegments('table/db.t1/'), ['table', 'db.t1']);
    assert.deepStrictEqual(splitSegments('table/db.t1/columns//'), ['table', 'db.t1', 'columns']);
  });

  it('should keep interior empty segments', () => {
    assert.deepStrictEqual(splitSegments('table/db.t1//comment'), ['table', 'db.t1', '', 'comment']);
  });

  it('should return nothing for an empty body', () => {
    assert.deepStrictEqual(splitSegments(''), []);
  });
});

describe('segmentsToParts', () => {

  it('should assign segments by position', () => {
    assert.deepStrictEqual(segmentsToParts(['table', 'db.t1', 'columns', 'id']), {
      entityType: 'table',
      entityFQN: 'db.t1',
      fieldName: 'columns',
      arrayFieldName: 'id'
    });
  });

  it('should leave empty segments out', () => {
    assert.deepStrictEqual(segmentsToParts(['table', 'db.t1', '', 'comment']), {
      entityType: 'table',
      entityFQN: 'db.t1',
      arrayFieldName: 'comment'
    });
  });

  it('should default missing type and fqn to empty strings', () => {
    assert.deepStrictEqual(segmentsToParts([]), { entityType: '', entityFQN: '' });
  });
});

describe('stripFallbackText', () => {

  it('should drop everything from the first bar and close the link', () => {
    assert.strictEqual(
      stripFallbackText('<#E/user/user1|[@User One](http://localhost:8585/user/user1)>'),
      '<#E/user/user1>'
    );
  });

  it('should leave text without a bar alone', () => {
    assert.strictEqual(stripFallbackText('<#E/user/user1>'), '<#E/user/user1>');
  });
});

describe('findCandidates', () => {

  it('should find tokens left to right with their offsets', () => {
    const found = Array.from(findCandidates('see <#E/a/b> and <#E/c/d>'));
    assert.deepStrictEqual(found, [
      { raw: '<#E/a/b>', index: 4 },
      { raw: '<#E/c/d>', index: 17 }
    ]);
  });

  it('should end a token at the first close delimiter', () => {
    const found = Array.from(findCandidates('<#E/a/b>c>'));
    assert.deepStrictEqual(found, [{ raw: '<#E/a/b>', index: 0 }]);
  });

  it('should not match a token interrupted by another open bracket', () => {
    const found = Array.from(findCandidates('<#E/a/<#E/b/c>'));
    assert.deepStrictEqual(found, [{ raw: '<#E/b/c>', index: 6 }]);
  });

  it('should not match unbalanced or empty tokens', () => {
    assert.deepStrictEqual(Array.from(findCandidates('<#E/table/db.t1 and <#E/>')), []);
  });

  it('should restart for every call', () => {
    const text = 'x <#E/a/b>';
    assert.strictEqual(Array.from(findCandidates(text)).length, 1);
    assert.strictEqual(Array.from(findCandidates(text)).length, 1);
  });
});

describe('candidateBody', () => {

  it('should return the text between the delimiters', () => {
    assert.strictEqual(candidateBody('<#E/table/db.t1/description>'), 'table/db.t1/description');
  });
});
