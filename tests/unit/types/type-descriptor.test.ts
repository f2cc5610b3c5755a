/**
 * @fileoverview Unit tests for runtime type descriptors
 *
 * Identity of values, assignability between descriptors and the mapping of
 * declared field types onto descriptors.
 */

import {
  builtin,
  defineInterface,
  fieldTypeOf,
  identityOf,
  implementsInterface,
  isAssignable,
  isIntrinsic,
  isRecordReference,
  recordOf,
  structOf,
} from '../../../src';

// ============================================================================
// Test Types
// ============================================================================

interface Clock {
  now(): number;
}

interface PreciseClock extends Clock {
  nanos(): bigint;
}

const ClockType = defineInterface<Clock>('Clock', ['now']);
const PreciseClockType = defineInterface<PreciseClock>('PreciseClock', ['now', 'nanos']);

class SystemClock implements Clock {
  now(): number {
    return 1700000000000;
  }
}

class MonotonicClock extends SystemClock implements PreciseClock {
  nanos(): bigint {
    return BigInt(42);
  }
}

class Mailer {
  send(): void {}
}

class FixedClock implements Clock {
  now = (): number => 0;
}

class LazyClock {
  get now(): () => number {
    return () => 0;
  }
}

// ============================================================================
// Test Suite
// ============================================================================

describe('Type Descriptors', () => {
  describe('identityOf', () => {
    it('should map a class instance to its record descriptor', () => {
      const type = identityOf(new SystemClock());

      expect(type).toBe(recordOf(SystemClock));
      expect(type.kind).toBe('record');
      expect(type.name).toBe('SystemClock');
    });

    it('should return one descriptor per class', () => {
      expect(identityOf(new Mailer())).toBe(identityOf(new Mailer()));
      expect(identityOf(new Mailer())).not.toBe(identityOf(new SystemClock()));
    });

    it('should map primitives and built-ins to built-in kinds', () => {
      expect(identityOf('postgres://localhost').kind).toBe('string');
      expect(identityOf(8080).kind).toBe('number');
      expect(identityOf(true).kind).toBe('boolean');
      expect(identityOf(BigInt(1)).kind).toBe('bigint');
      expect(identityOf(() => 1).kind).toBe('function');
      expect(identityOf([1, 2]).kind).toBe('sequence');
      expect(identityOf(new Map()).kind).toBe('map');
      expect(identityOf(undefined).kind).toBe('unknown');
      expect(identityOf(null).kind).toBe('unknown');
    });

    it('should describe plain objects by their methods', () => {
      const type = identityOf({ now: () => 1, zone: 'UTC' });

      expect(type.kind).toBe('object');
      expect(isAssignable(type, ClockType)).toBe(true);
      expect(isAssignable(type, PreciseClockType)).toBe(false);
    });

    it('should treat prototype-less objects as plain objects', () => {
      expect(identityOf(Object.create(null)).kind).toBe('object');
    });
  });

  describe('isRecordReference', () => {
    it('should accept only class instances', () => {
      expect(isRecordReference(identityOf(new Mailer()))).toBe(true);
      expect(isRecordReference(identityOf({}))).toBe(false);
      expect(isRecordReference(identityOf('mailer'))).toBe(false);
      expect(isRecordReference(structOf(Mailer))).toBe(false);
    });
  });

  describe('isAssignable', () => {
    it('should accept the exact class and its subclasses', () => {
      expect(isAssignable(recordOf(SystemClock), recordOf(SystemClock))).toBe(true);
      expect(isAssignable(recordOf(MonotonicClock), recordOf(SystemClock))).toBe(true);
    });

    it('should reject base classes and unrelated classes', () => {
      expect(isAssignable(recordOf(SystemClock), recordOf(MonotonicClock))).toBe(false);
      expect(isAssignable(recordOf(Mailer), recordOf(SystemClock))).toBe(false);
    });

    it('should check interfaces structurally, including inherited methods', () => {
      expect(isAssignable(recordOf(SystemClock), ClockType)).toBe(true);
      expect(isAssignable(recordOf(MonotonicClock), PreciseClockType)).toBe(true);
      expect(isAssignable(recordOf(SystemClock), PreciseClockType)).toBe(false);
      expect(isAssignable(recordOf(Mailer), ClockType)).toBe(false);
    });

    it('should not count getters as methods', () => {
      expect(isAssignable(recordOf(LazyClock), ClockType)).toBe(false);
    });

    it('should let a wider interface satisfy a narrower one', () => {
      expect(isAssignable(PreciseClockType, ClockType)).toBe(true);
      expect(isAssignable(ClockType, PreciseClockType)).toBe(false);
    });

    it('should match built-in kinds by kind', () => {
      expect(isAssignable(identityOf('a'), builtin('string'))).toBe(true);
      expect(isAssignable(identityOf(1), builtin('string'))).toBe(false);
      expect(isAssignable(identityOf(new Map()), builtin('map'))).toBe(true);
    });

    it('should let anything fill an unknown field', () => {
      expect(isAssignable(identityOf(new Mailer()), builtin('unknown'))).toBe(true);
      expect(isAssignable(identityOf('x'), builtin('unknown'))).toBe(true);
    });

    it('should never assign a reference to a by-value field', () => {
      expect(isAssignable(recordOf(Mailer), structOf(Mailer))).toBe(false);
    });
  });

  describe('implementsInterface', () => {
    it('should find methods on the prototype chain', () => {
      expect(implementsInterface(new SystemClock(), ClockType)).toBe(true);
      expect(implementsInterface(new MonotonicClock(), PreciseClockType)).toBe(true);
      expect(implementsInterface(new SystemClock(), PreciseClockType)).toBe(false);
    });

    it('should find arrow-function properties on the value itself', () => {
      expect(implementsInterface(new FixedClock(), ClockType)).toBe(true);
      expect(implementsInterface({ now: () => 0 }, ClockType)).toBe(true);
    });

    it('should not count getters or non-function properties', () => {
      expect(implementsInterface(new LazyClock(), ClockType)).toBe(false);
      expect(implementsInterface({ now: 0 }, ClockType)).toBe(false);
    });

    it('should reject values that are not objects', () => {
      expect(implementsInterface('clock', ClockType)).toBe(false);
      expect(implementsInterface(null, ClockType)).toBe(false);
    });
  });

  describe('isIntrinsic', () => {
    it('should flag built-in classes', () => {
      expect(isIntrinsic(Promise)).toBe(true);
      expect(isIntrinsic(Date)).toBe(true);
      expect(isIntrinsic(Set)).toBe(true);
      expect(isIntrinsic(WeakMap)).toBe(true);
    });

    it('should leave user classes alone', () => {
      expect(isIntrinsic(Mailer)).toBe(false);
      expect(isIntrinsic(SystemClock)).toBe(false);
    });
  });

  describe('fieldTypeOf', () => {
    it('should map emitted built-in constructors', () => {
      expect(fieldTypeOf(String, false)).toBe(builtin('string'));
      expect(fieldTypeOf(Number, false)).toBe(builtin('number'));
      expect(fieldTypeOf(Boolean, false)).toBe(builtin('boolean'));
      expect(fieldTypeOf(Array, false)).toBe(builtin('sequence'));
      expect(fieldTypeOf(Map, false)).toBe(builtin('map'));
      expect(fieldTypeOf(Function, false)).toBe(builtin('function'));
      expect(fieldTypeOf(Object, false)).toBe(builtin('unknown'));
      expect(fieldTypeOf(undefined, false)).toBe(builtin('unknown'));
    });

    it('should map a class to a reference, or to a value under inline', () => {
      expect(fieldTypeOf(Mailer, false)).toBe(recordOf(Mailer));
      expect(fieldTypeOf(Mailer, true)).toBe(structOf(Mailer));
    });

    it('should pass explicit descriptors through', () => {
      expect(fieldTypeOf(ClockType, false)).toBe(ClockType);
      expect(fieldTypeOf(ClockType, true)).toBe(ClockType);
    });
  });
});
