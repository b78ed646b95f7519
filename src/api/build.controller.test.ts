import { describe, it, expect, vi } from 'vitest';
import { Request, Response } from 'express';
import { createBuildController, BuildControllerDeps } from './build.controller';
import { ArchiveStagingError } from '../intake/archiveStore';

interface CapturedResponse {
  status?: number;
  type?: string;
  body?: string;
}

const stubResponse = () => {
  const captured: CapturedResponse = {};
  const res = {
    status(code: number) {
      captured.status = code;
      return this;
    },
    type(value: string) {
      captured.type = value;
      return this;
    },
    send(body: string) {
      captured.body = body;
      return this;
    },
  };
  // Only the members the controller touches are implemented
  return { res: res as unknown as Response, captured };
};

const stubRequest = (fields: Record<string, unknown>, file?: { originalname: string; size: number; buffer: Buffer }) =>
  ({ body: fields, file } as unknown as Request);

const zip = { originalname: 'demo.zip', size: 4, buffer: Buffer.from('PK..') };

const deps = (overrides: Partial<{ outcome: string; stageError: Error; engineError: Error }> = {}) => {
  const engine = {
    executeBuild: vi.fn(async () => {
      if (overrides.engineError) throw overrides.engineError;
      return overrides.outcome ?? 'Using build image: maven:3.8-openjdk-17\n...\n--- BUILD STATUS: SUCCESS ---';
    }),
  };
  const store = {
    stage: vi.fn(async () => {
      if (overrides.stageError) throw overrides.stageError;
      return '/srv/temp_builds/123.zip';
    }),
    discard: vi.fn(async () => undefined),
  };
  return { engine, store, deps: { engine, store } satisfies BuildControllerDeps };
};

describe('buildSynchronously', () => {
  it('stages the upload, runs the build and returns the outcome as text', async () => {
    const { engine, store, deps: d } = deps();
    const { res, captured } = stubResponse();

    await createBuildController(d).buildSynchronously(stubRequest({ projectType: 'maven' }, zip), res);

    expect(store.stage).toHaveBeenCalledWith(zip.buffer);
    expect(engine.executeBuild).toHaveBeenCalledWith('/srv/temp_builds/123.zip', 'MAVEN');
    expect(store.discard).toHaveBeenCalledWith('/srv/temp_builds/123.zip');
    expect(captured).toEqual({
      status: 200,
      type: 'text/plain',
      body: 'Using build image: maven:3.8-openjdk-17\n...\n--- BUILD STATUS: SUCCESS ---',
    });
  });

  it('returns 200 for failed builds too', async () => {
    const { deps: d } = deps({ outcome: 'Exit Code: 1\n--- BUILD STATUS: FAILED ---' });
    const { res, captured } = stubResponse();

    await createBuildController(d).buildSynchronously(stubRequest({ projectType: 'npm' }, zip), res);

    expect(captured.status).toBe(200);
    expect(captured.body).toBe('Exit Code: 1\n--- BUILD STATUS: FAILED ---');
  });

  it('rejects invalid uploads before staging anything', async () => {
    const { engine, store, deps: d } = deps();
    const { res, captured } = stubResponse();

    await createBuildController(d).buildSynchronously(stubRequest({ projectType: 'cargo' }, zip), res);

    expect(captured).toEqual({
      status: 400,
      type: 'text/plain',
      body: 'Error: Invalid project type. Allowed: MAVEN, NPM, PIP',
    });
    expect(store.stage).not.toHaveBeenCalled();
    expect(engine.executeBuild).not.toHaveBeenCalled();
  });

  it('rejects a request without a file', async () => {
    const { deps: d } = deps();
    const { res, captured } = stubResponse();

    await createBuildController(d).buildSynchronously(stubRequest({ projectType: 'pip' }), res);

    expect(captured.status).toBe(400);
    expect(captured.body).toBe('Error: File cannot be empty');
  });

  it('reports staging failures as 500 without calling the engine', async () => {
    const { engine, store, deps: d } = deps({ stageError: new ArchiveStagingError('Potential path traversal attempt') });
    const { res, captured } = stubResponse();

    await createBuildController(d).buildSynchronously(stubRequest({ projectType: 'pip' }, zip), res);

    expect(captured).toEqual({
      status: 500,
      type: 'text/plain',
      body: 'Error saving/processing file: Potential path traversal attempt',
    });
    expect(engine.executeBuild).not.toHaveBeenCalled();
    expect(store.discard).not.toHaveBeenCalled();
  });

  it('still deletes the staged file when the build throws', async () => {
    const { store, deps: d } = deps({ engineError: new Error('engine crashed') });
    const { res, captured } = stubResponse();

    await createBuildController(d).buildSynchronously(stubRequest({ projectType: 'maven' }, zip), res);

    expect(captured.status).toBe(500);
    expect(captured.body).toBe('Unexpected build error: engine crashed');
    expect(store.discard).toHaveBeenCalledTimes(1);
  });
});
