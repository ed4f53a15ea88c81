import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { buildPipelineRequest, parseReviewers, type PrOptions } from '../src/options.js';

const defaults: PrOptions = { body: '', reviewers: [], mergeMethod: 'squash' };

describe('parseReviewers', () => {
  it('splits a comma-separated list', () => {
    expect(parseReviewers('bob, carol')).toEqual(['bob', 'carol']);
  });

  it('accumulates repeated flags without duplicates', () => {
    expect(parseReviewers('carol,dave', ['bob', 'carol'])).toEqual(['bob', 'carol', 'dave']);
  });

  it('accepts org/team slugs', () => {
    expect(parseReviewers('acme/core-team')).toEqual(['acme/core-team']);
  });

  it('ignores empty entries', () => {
    expect(parseReviewers('bob,,')).toEqual(['bob']);
  });

  it.each(['-bob', 'bob smith', 'a/b/c'])('rejects %j', (value) => {
    expect(() => parseReviewers(value)).toThrow(InvalidArgumentError);
  });
});

describe('buildPipelineRequest', () => {
  it('maps bare options to a plain request', () => {
    expect(buildPipelineRequest('fix: typo', defaults)).toEqual({
      message: 'fix: typo',
      body: '',
      interactive: false,
      addAll: false,
      draft: false,
      reviewers: [],
      merge: { kind: 'none' },
    });
  });

  it('maps --merge with its method', () => {
    const request = buildPipelineRequest('x', { ...defaults, merge: true, mergeMethod: 'rebase' });

    expect(request.merge).toEqual({ kind: 'merge', method: 'rebase' });
  });

  it('maps --auto-merge', () => {
    const request = buildPipelineRequest('x', { ...defaults, autoMerge: true });

    expect(request.merge).toEqual({ kind: 'auto-merge', method: 'squash' });
  });

  it('carries the flags through', () => {
    const request = buildPipelineRequest('x', {
      ...defaults,
      body: 'details',
      interactive: true,
      add: true,
      draft: true,
      reviewers: ['bob'],
    });

    expect(request).toMatchObject({ body: 'details', interactive: true, addAll: true, draft: true, reviewers: ['bob'] });
  });
});
