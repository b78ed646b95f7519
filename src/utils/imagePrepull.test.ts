import { describe, it, expect } from 'vitest';
import { prePullImages } from './imagePrepull';
import { FakeRuntime } from '../runtime/__tests__/fakeRuntime';

describe('prePullImages', () => {
  it('pulls every profile image', async () => {
    const runtime = new FakeRuntime();
    await expect(prePullImages(runtime)).resolves.toEqual([
      'maven:3.8-openjdk-17',
      'node:20-alpine',
      'python:3.11-slim',
    ]);
    expect(runtime.pulled).toHaveLength(3);
  });

  it('continues past failed pulls', async () => {
    const runtime = new FakeRuntime();
    runtime.pullFailures.add('node:20-alpine');
    await expect(prePullImages(runtime)).resolves.toEqual(['maven:3.8-openjdk-17', 'python:3.11-slim']);
  });
});
