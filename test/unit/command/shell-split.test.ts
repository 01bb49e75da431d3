import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { ShellSyntaxError, shellSplit } from '../../../src/command/shell-split';

describe('shellSplit', () => {
  it('should split on whitespace', () => {
    assert.deepEqual(shellSplit('train.py --epochs 3'), ['train.py', '--epochs', '3']);
    assert.deepEqual(shellSplit('  a \t b\n c  '), ['a', 'b', 'c']);
  });

  it('should return no words for blank input', () => {
    assert.deepEqual(shellSplit(''), []);
    assert.deepEqual(shellSplit('   '), []);
  });

  it('should keep quoted whitespace', () => {
    assert.deepEqual(shellSplit('train --msg "hello world"'), ['train', '--msg', 'hello world']);
    assert.deepEqual(shellSplit("a 'b c' d"), ['a', 'b c', 'd']);
  });

  it('should join adjacent quoted and unquoted parts', () => {
    assert.deepEqual(shellSplit('x"y"z'), ['xyz']);
    assert.deepEqual(shellSplit("--name='a b'"), ['--name=a b']);
  });

  it('should keep empty quoted words', () => {
    assert.deepEqual(shellSplit("a '' b"), ['a', '', 'b']);
    assert.deepEqual(shellSplit('""'), ['']);
  });

  it('should apply backslash escapes outside quotes', () => {
    assert.deepEqual(shellSplit('a\\ b'), ['a b']);
    assert.deepEqual(shellSplit('\\"x'), ['"x']);
  });

  it('should apply only the double-quote escapes inside double quotes', () => {
    assert.deepEqual(shellSplit('"a\\"b"'), ['a"b']);
    assert.deepEqual(shellSplit('"a\\nb"'), ['a\\nb']);
  });

  it('should keep backslashes inside single quotes', () => {
    assert.deepEqual(shellSplit("'a\\b'"), ['a\\b']);
  });

  it('should not treat # as a comment', () => {
    assert.deepEqual(shellSplit('a #b'), ['a', '#b']);
  });

  it('should reject an unterminated quote', () => {
    assert.throws(() => shellSplit('train "abc'), ShellSyntaxError);
    assert.throws(() => shellSplit("train 'abc"), { message: 'No closing quotation' });
  });

  it('should reject a trailing backslash', () => {
    assert.throws(() => shellSplit('abc\\'), { message: 'No escaped character' });
  });
});
