import _ from 'lodash';

declare module 'lodash' {
  interface LoDashStatic {
    firstUndeclared<T>(values: Iterable<T>, declared: ReadonlySet<T>): T | undefined;
  }
}

let firstUndeclared = <T>(values: Iterable<T>, declared: ReadonlySet<T>): T | undefined =>
  _.find(Array.from(values), (value) => !declared.has(value));

_.mixin({
  firstUndeclared: firstUndeclared,
});

export default _;
