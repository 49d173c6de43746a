import { describe, expect, it } from 'vitest';

import { createModalStore } from '../src/store/stores/modalStore';

describe('modal store', () => {
  it('starts hidden', () => {
    const store = createModalStore();
    expect(store.getState().modal).toEqual({ status: 'hidden' });
    expect(store.getState().isVisible()).toBe(false);
  });

  it('opens with the requested url and title', () => {
    const store = createModalStore();
    expect(store.getState().open('https://example.com/site', 'Site')).toBe(true);
    expect(store.getState().modal).toEqual({
      status: 'visible',
      url: 'https://example.com/site',
      title: 'Site'
    });
  });

  it('refuses to open without a url', () => {
    const store = createModalStore();
    expect(store.getState().open('   ', 'Empty')).toBe(false);
    expect(store.getState().modal).toEqual({ status: 'hidden' });
  });

  it('closes back to hidden and stays hidden on repeated close', () => {
    const store = createModalStore();
    store.getState().open('https://example.com/site', 'Site');

    store.getState().close();
    store.getState().close();

    expect(store.getState().modal).toEqual({ status: 'hidden' });
  });
});
