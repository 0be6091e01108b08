'use strict';

import assert from 'assert';

import ModThree, {
  BinaryDigit,
  compileModThree,
  MOD_THREE_DEFINITION,
  RemainderState,
} from '../src/ModThree';
import {
  ConfigError,
  InputTypeError,
  InternalConfigError,
  InvalidCharacterError,
  ModThreeError,
  RejectedError,
  StepError,
  UndefinedTransitionError,
} from '../src/errors';
import { silentLogger } from '../src/logger';

const STATES: RemainderState[] = ['R0', 'R1', 'R2'];
const DIGITS: [BinaryDigit, number][] = [['0', 0], ['1', 1]];
// shortest inputs ending in R0, R1 and R2
const PREFIXES = ['', '1', '10'];

function modThree(): ModThree {
  return new ModThree({ logger: silentLogger, engineLogger: silentLogger });
}

describe('ModThree', function() {
  describe('getRemainder', function() {
    it('1101 is 13', function () {
      assert.strictEqual(modThree().getRemainder('1101'), 1);
    });

    it('1110 is 14', function () {
      assert.strictEqual(modThree().getRemainder('1110'), 2);
    });

    it('1111 is 15', function () {
      assert.strictEqual(modThree().getRemainder('1111'), 0);
    });

    it('empty string is 0', function () {
      assert.strictEqual(modThree().getRemainder(''), 0);
    });

    it('leading zeros', function () {
      let mod = modThree();
      assert.strictEqual(mod.getRemainder('0'), 0);
      assert.strictEqual(mod.getRemainder('0001'), 1);
      assert.strictEqual(mod.getRemainder('00101'), 2);
    });

    it('agrees with arithmetic for every string up to 20 digits', function () {
      this.timeout(120000);

      let mod = modThree();
      for (let length = 0; length <= 20; length++) {
        for (let value = 0; value < 2 ** length; value++) {
          let digits = length === 0 ? '' : value.toString(2).padStart(length, '0');
          let remainder = mod.getRemainder(digits);
          if (remainder !== value % 3)
            assert.fail(digits + ' gave ' + remainder + ', expected ' + value % 3);
        }
      }
    });

    it('characters other than 0 and 1', function () {
      assert.throws(() => modThree().getRemainder('102'), (e: unknown) => {
        assert.ok(e instanceof InvalidCharacterError);
        assert.ok(e instanceof ModThreeError);
        assert.strictEqual(e.kind, 'invalid-character');
        assert.deepStrictEqual(e.characters, ['2']);
        assert.strictEqual(e.message, "Binary string contains invalid characters: [ '2' ]");
        return true;
      });
    });

    it('reports each invalid character once', function () {
      assert.throws(() => modThree().getRemainder('1a0a2'), { characters: ['a', '2'] });
      assert.throws(() => modThree().getRemainder('abc'), { characters: ['a', 'b', 'c'] });
    });

    it('non string input', function () {
      let mod = modThree();
      assert.throws(() => mod.getRemainder(JSON.parse('12')), (e: unknown) => {
        assert.ok(e instanceof InputTypeError);
        assert.ok(e instanceof ModThreeError);
        assert.strictEqual(e.kind, 'input-type');
        assert.strictEqual(e.message, "Input must be a string: 'number'");
        return true;
      });
      assert.throws(() => mod.getRemainder(JSON.parse('null')), {
        kind: 'input-type',
        message: "Input must be a string: 'null'",
      });
    });

    it('does not run the automaton for an empty string', function () {
      let mod = modThree();
      mod.getRemainder('10');
      assert.strictEqual(mod.currentState, 'R2');
      mod.getRemainder('');
      assert.strictEqual(mod.currentState, 'R2');
    });
  });

  describe('transitions', function() {
    it('digit d in remainder r goes to remainder (2r + d) mod 3', function () {
      STATES.forEach((state, r) => {
        DIGITS.forEach(([digit, d]) => {
          assert.strictEqual(MOD_THREE_DEFINITION.table[state]?.[digit], STATES[(2 * r + d) % 3],
            state + ' on ' + digit);
        });
      });
    });

    it('the engine follows the same rule', function () {
      let dfa = compileModThree(MOD_THREE_DEFINITION, silentLogger);
      STATES.forEach((state, r) => {
        DIGITS.forEach(([digit, d]) => {
          assert.strictEqual(dfa.run(PREFIXES[r]), state);
          dfa.step(digit);
          assert.strictEqual(dfa.currentState, STATES[(2 * r + d) % 3], state + ' on ' + digit);
        });
      });
    });

    it('every state is accepting', function () {
      assert.deepStrictEqual([...MOD_THREE_DEFINITION.acceptStates], STATES);
    });
  });

  it('reset and currentState', function () {
    let mod = modThree();
    assert.strictEqual(mod.currentState, 'R0');
    mod.getRemainder('1');
    assert.strictEqual(mod.currentState, 'R1');
    mod.reset();
    assert.strictEqual(mod.currentState, 'R0');
  });

  it('tryGetRemainder', function () {
    let mod = modThree();
    assert.deepStrictEqual(mod.tryGetRemainder('1110'), { ok: true, value: 2 });

    let result = mod.tryGetRemainder('12');
    assert.strictEqual(result.ok, false);
    if (!result.ok)
      assert.strictEqual(result.error.kind, 'invalid-character');
  });

  it('toString', function () {
    let mod = modThree();
    mod.getRemainder('10');
    assert.strictEqual(mod.toString(), 'ModThree(current=R2)');
  });

  describe('engine failures', function() {
    it('a missing transition', function () {
      let mod = new ModThree({
        definition: { ...MOD_THREE_DEFINITION, table: { ...MOD_THREE_DEFINITION.table, R1: { '0': 'R2' } } },
        logger: silentLogger,
        engineLogger: silentLogger,
      });
      assert.throws(() => mod.getRemainder('11'), (e: unknown) => {
        assert.ok(e instanceof ModThreeError);
        assert.strictEqual(e.kind, 'engine');
        assert.ok(e.cause instanceof StepError);
        assert.strictEqual(e.cause.position, 1);
        assert.ok(e.cause.cause instanceof UndefinedTransitionError);
        return true;
      });
    });

    it('a rejected input', function () {
      let mod = new ModThree({
        definition: { ...MOD_THREE_DEFINITION, acceptStates: ['R0'] },
        logger: silentLogger,
        engineLogger: silentLogger,
      });
      assert.strictEqual(mod.getRemainder('11'), 0);
      assert.throws(() => mod.getRemainder('1'), (e: unknown) => {
        assert.ok(e instanceof ModThreeError);
        assert.strictEqual(e.kind, 'engine');
        assert.ok(e.cause instanceof RejectedError);
        assert.strictEqual(e.cause.state, 'R1');
        return true;
      });
    });

    it('a broken definition fails construction', function () {
      assert.throws(() => new ModThree({
        definition: { ...MOD_THREE_DEFINITION, states: ['R0', 'R1'] },
        logger: silentLogger,
        engineLogger: silentLogger,
      }), { kind: 'internal-config' });
    });
  });

  describe('compileModThree', function() {
    it('a broken definition is an internal error', function () {
      let broken = { ...MOD_THREE_DEFINITION, states: STATES.slice(0, 2) };
      assert.throws(() => compileModThree(broken, silentLogger), (e: unknown) => {
        assert.ok(e instanceof InternalConfigError);
        assert.ok(e instanceof ModThreeError);
        assert.strictEqual(e.kind, 'internal-config');
        assert.ok(e.cause instanceof ConfigError);
        assert.strictEqual(e.cause.violation, 'unknown-accept-state');
        assert.strictEqual(e.message, "Modulo-3 automaton definition is invalid: 'unknown-accept-state'");
        return true;
      });
    });
  });
});
