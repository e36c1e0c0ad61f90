import { describe, it, expect, vi } from 'vitest';
import { PendingRequest } from '../src/pending-request.js';
import { PermissionContractError } from '../src/errors.js';
import type { PermissionKind, PermissionStatus } from '../src/types.js';
import { makeContext } from './fake-context.js';

function makeRequest(kinds: PermissionKind[] = ['geolocation', 'notifications']) {
  const context = makeContext({ id: 'ctx-owner' });
  const callback = vi.fn<(statuses: PermissionStatus[]) => void>();
  const onGeolocation = vi.fn();
  const request = new PendingRequest(context, kinds, callback, { geolocation: onGeolocation });
  return { context, callback, onGeolocation, request };
}

describe('PendingRequest', () => {
  // ── Construction ──────────────────────────────────────────────────────

  it('starts with every slot denied and nothing resolved', () => {
    const { request, callback } = makeRequest();
    expect(request.results).toEqual(['denied', 'denied']);
    expect(request.remaining).toBe(2);
    expect(request.isComplete()).toBe(false);
    expect(request.ownerId).toBe('ctx-owner');
    expect(callback).not.toHaveBeenCalled();
  });

  it('keeps its own copy of the kinds', () => {
    const kinds: Array<'geolocation' | 'midi'> = ['geolocation', 'midi'];
    const { request } = makeRequest(kinds);
    kinds.push('midi');
    expect(request.permissionKinds).toEqual(['geolocation', 'midi']);
  });

  // ── resolveSlot ───────────────────────────────────────────────────────

  it('writes the status into the matching slot', () => {
    const { request } = makeRequest();
    request.resolveSlot(1, 'granted');
    expect(request.results).toEqual(['denied', 'granted']);
    expect(request.remaining).toBe(1);
  });

  it('completes once every slot is resolved, in any order', () => {
    const { request } = makeRequest();
    request.resolveSlot(1, 'denied');
    request.resolveSlot(0, 'granted');
    expect(request.isComplete()).toBe(true);
    expect(request.results).toEqual(['granted', 'denied']);
  });

  it('runs the side-effect hook on grant', () => {
    const { request, onGeolocation } = makeRequest();
    request.resolveSlot(0, 'granted');
    expect(onGeolocation).toHaveBeenCalledTimes(1);
    expect(onGeolocation).toHaveBeenCalledWith({ kind: 'geolocation', ownerId: 'ctx-owner' });
  });

  it('does not run the side-effect hook on denial', () => {
    const { request, onGeolocation } = makeRequest();
    request.resolveSlot(0, 'denied');
    expect(onGeolocation).not.toHaveBeenCalled();
  });

  it('runs the hook before the slot is written', () => {
    const { request, onGeolocation } = makeRequest();
    let seen: PermissionStatus[] = [];
    onGeolocation.mockImplementation(() => {
      seen = request.results;
    });
    request.resolveSlot(0, 'granted');
    expect(seen).toEqual(['denied', 'denied']);
  });

  it('reports which slots are resolved', () => {
    const { request } = makeRequest();
    request.resolveSlot(1, 'denied');
    expect(request.isSlotResolved(0)).toBe(false);
    expect(request.isSlotResolved(1)).toBe(true);
    expect(request.isSlotResolved(5)).toBe(false);
  });

  // ── Contract violations ───────────────────────────────────────────────

  it('rejects a second answer for the same slot without changing state', () => {
    const { request, onGeolocation } = makeRequest();
    request.resolveSlot(0, 'granted');

    expect(() => request.resolveSlot(0, 'granted')).toThrow(PermissionContractError);
    expect(request.remaining).toBe(1);
    expect(onGeolocation).toHaveBeenCalledTimes(1);
  });

  it('rejects answers after completion', () => {
    const { request } = makeRequest(['geolocation']);
    request.resolveSlot(0, 'denied');

    expect(() => request.resolveSlot(0, 'granted')).toThrow('answered after the request completed');
    expect(request.remaining).toBe(0);
    expect(request.results).toEqual(['denied']);
  });

  it.each([-1, 2, 0.5])('rejects out-of-range slot %s', (slot) => {
    const { request } = makeRequest();
    expect(() => request.resolveSlot(slot, 'granted')).toThrow(PermissionContractError);
    expect(request.remaining).toBe(2);
  });

  // ── runCallback ───────────────────────────────────────────────────────

  it('hands the results to the callback exactly once', () => {
    const { request, callback } = makeRequest();
    request.resolveSlot(0, 'granted');
    request.resolveSlot(1, 'ask');

    request.runCallback();
    request.runCallback();

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith(['granted', 'ask']);
  });

  it('can run with partial results', () => {
    const { request, callback } = makeRequest();
    request.resolveSlot(0, 'granted');
    request.runCallback();
    expect(callback).toHaveBeenCalledWith(['granted', 'denied']);
  });

  // ── resolveContext ────────────────────────────────────────────────────

  it('resolves the context while it exists', () => {
    const { request, context } = makeRequest();
    expect(request.resolveContext()).toBe(context);
  });

  it('resolves to undefined once the context is released', () => {
    const { request, context } = makeRequest();
    context.release();
    expect(request.resolveContext()).toBeUndefined();
  });
});
