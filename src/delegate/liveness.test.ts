import test from 'node:test';
import assert from 'node:assert/strict';
import { Delegate } from './delegate.js';
import { LivenessToken, Observer, resolveToken, withObserver } from './liveness.js';

test('LivenessToken: starts alive and stays dead once invalidated', () => {
  const token = new LivenessToken();
  assert.equal(token.alive, true);

  token.invalidate();
  token.invalidate();

  assert.equal(token.alive, false);
});

test('Observer: each observer mints its own token', () => {
  const a = new Observer();
  const b = new Observer();

  a.dispose();

  assert.equal(a.disposed, true);
  assert.equal(b.disposed, false);
  assert.notEqual(a.liveness, b.liveness);
});

test('resolveToken: weak reference resolves to the observer\'s own token', () => {
  const o = new Observer();

  assert.equal(resolveToken(o).deref(), o.liveness);
  assert.equal(resolveToken(new WeakRef(o)).deref(), o.liveness);
});

test('resolveToken: reference taken before dispose reports dead afterwards', () => {
  const o = new Observer();
  const ref = resolveToken(o);

  o.dispose();

  assert.equal(ref.deref()?.alive, false);
});

test('withObserver: a subclass of another base registers itself and is evicted on dispose', () => {
  class Widget {
    constructor(readonly name: string) {}
  }
  class Label extends withObserver(Widget) {
    text = '';
    constructor(source: Delegate<[string]>) {
      super('label');
      source.add((t) => {
        this.text = t;
      }, this);
    }
  }

  const source = new Delegate<[string]>();
  const label = new Label(source);
  source.invoke('hello');
  label.dispose();
  source.invoke('ignored');

  assert.equal(label.name, 'label');
  assert.equal(label.text, 'hello');
  assert.equal(label.disposed, true);
  assert.equal(source.size, 0);
});
