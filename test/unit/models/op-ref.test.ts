import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { AttributeSource, OpRef, OpRefError } from '../../../src/models/op-ref';
import { ErrorCode } from '../../../src/errors/error-codes';

function runWithOpref(opref: unknown): AttributeSource {
  return {
    id: 'run-1',
    getAttribute: (name: string) => (name === 'opref' ? opref : undefined),
  };
}

function assertOpRefError(fn: () => unknown, code: ErrorCode): void {
  assert.throws(fn, (err: Error) => err instanceof OpRefError && err.code === code);
}

describe('OpRef', () => {
  const modelRef = {
    pkgType: 'modelfile',
    pkgName: '/home/test/project',
    pkgVersion: 'a1b2c3d4',
    modelName: 'mnist',
  };

  describe('fromOperation / toString', () => {
    it('should render the canonical form', () => {
      const opref = OpRef.fromOperation('train', modelRef);
      assert.equal(opref.toString(), 'modelfile:/home/test/project a1b2c3d4 mnist train');
      assert.ok(opref.isFullyKnown());
    });

    it('should render unknown fields as ?', () => {
      assert.equal(new OpRef({ opName: 'train' }).toString(), '?:? ? ? train');
      assert.equal(OpRef.fromOperation('eval', { modelName: 'mnist' }).toString(), '?:? ? mnist eval');
    });

    it('should percent-encode spaces and percent signs inside fields', () => {
      const opref = OpRef.fromOperation('train', { ...modelRef, pkgName: '/home/test/My Projects/100%' });
      assert.equal(opref.toString(), 'modelfile:/home/test/My%20Projects/100%25 a1b2c3d4 mnist train');
    });

    it('should be immutable', () => {
      assert.ok(Object.isFrozen(OpRef.fromOperation('train', modelRef)));
    });

    it('should expose the model reference', () => {
      assert.deepEqual(OpRef.fromOperation('train', modelRef).modelRef, modelRef);
    });
  });

  describe('fromRun', () => {
    it('should parse what toString wrote', () => {
      const opref = OpRef.fromOperation('train', modelRef);
      assert.ok(OpRef.fromRun(runWithOpref(opref.toString())).equals(opref));
    });

    it('should decode fields containing spaces', () => {
      const opref = OpRef.fromOperation('train', { ...modelRef, pkgName: '/home/test/My Projects' });
      const parsed = OpRef.fromRun(runWithOpref(opref.toString()));
      assert.equal(parsed.pkgName, '/home/test/My Projects');
      assert.ok(parsed.equals(opref));
    });

    it('should read ? back as unknown', () => {
      const opref = OpRef.fromRun(runWithOpref('?:? ? mnist train'));
      assert.equal(opref.pkgType, undefined);
      assert.equal(opref.pkgName, undefined);
      assert.equal(opref.pkgVersion, undefined);
      assert.equal(opref.modelName, 'mnist');
      assert.equal(opref.opName, 'train');
    });

    it('should split the package type at the first colon', () => {
      const opref = OpRef.fromRun(runWithOpref('pkg:gpkg:mnist 0.1 mnist train'));
      assert.equal(opref.pkgType, 'pkg');
      assert.equal(opref.pkgName, 'gpkg:mnist');
    });

    it('should allow trailing whitespace', () => {
      assert.equal(OpRef.fromRun(runWithOpref('a:b c d e   ')).opName, 'e');
    });

    it('should fail when the run has no opref attribute', () => {
      assertOpRefError(() => OpRef.fromRun(runWithOpref(undefined)), ErrorCode.E301_OPREF_MISSING);
      assert.throws(() => OpRef.fromRun(runWithOpref(undefined)), {
        message: "[E301] run run-1 does not have attr 'opref'",
      });
    });

    it('should fail on a malformed attribute', () => {
      assertOpRefError(() => OpRef.fromRun(runWithOpref('train')), ErrorCode.E302_OPREF_MALFORMED);
      assertOpRefError(() => OpRef.fromRun(runWithOpref('a:b c d')), ErrorCode.E302_OPREF_MALFORMED);
      assert.throws(() => OpRef.fromRun(runWithOpref('train')), {
        message: '[E302] bad opref attr for run run-1: train',
      });
    });
  });

  describe('fromString', () => {
    it('should parse package, model and operation', () => {
      const { opref, extra } = OpRef.fromString('pkg/model:op');
      assert.equal(opref.pkgType, undefined);
      assert.equal(opref.pkgName, 'pkg');
      assert.equal(opref.pkgVersion, undefined);
      assert.equal(opref.modelName, 'model');
      assert.equal(opref.opName, 'op');
      assert.equal(extra, '');
    });

    it('should parse a model-qualified operation', () => {
      const { opref } = OpRef.fromString('mnist:train');
      assert.equal(opref.pkgName, undefined);
      assert.equal(opref.modelName, 'mnist');
      assert.equal(opref.opName, 'train');
    });

    it('should parse a bare operation name', () => {
      const { opref, extra } = OpRef.fromString('op');
      assert.ok(opref.equals(new OpRef({ opName: 'op' })));
      assert.equal(extra, '');
    });

    it('should return trailing text as extra', () => {
      const { opref, extra } = OpRef.fromString('op --extra');
      assert.equal(opref.opName, 'op');
      assert.equal(extra, ' --extra');
    });

    it('should not let extra text span lines', () => {
      assertOpRefError(() => OpRef.fromString('op\nfoo'), ErrorCode.E303_INVALID_REFERENCE);
    });

    it('should fail when no operation name matches', () => {
      assertOpRefError(() => OpRef.fromString(''), ErrorCode.E303_INVALID_REFERENCE);
      assertOpRefError(() => OpRef.fromString('!train'), ErrorCode.E303_INVALID_REFERENCE);
    });

    it('should not parse the canonical form back', () => {
      const canonical = OpRef.fromOperation('train', modelRef).toString();
      const { opref } = OpRef.fromString(canonical);
      assert.ok(!opref.equals(OpRef.fromOperation('train', modelRef)));
    });
  });

  describe('equals', () => {
    it('should compare all five fields', () => {
      const a = OpRef.fromOperation('train', modelRef);
      assert.ok(a.equals(OpRef.fromOperation('train', { ...modelRef })));
      assert.ok(!a.equals(OpRef.fromOperation('train', { ...modelRef, pkgVersion: 'ffffffff' })));
      assert.ok(!a.equals(OpRef.fromOperation('eval', modelRef)));
    });
  });
});
