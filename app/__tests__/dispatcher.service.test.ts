import { DispatchError, ProviderCallError } from '../core/errors';
import type { AnalysisRequest, CompletionResult } from '../application/types';
import { ANALYSIS_SYSTEM_PROMPT } from '../domain/services/analysis';
import { analysisReply, createDispatchHarness, healthResult } from './support/fakes';

const request: AnalysisRequest = {
  content: 'Chip export rules',
  mediaType: 'text',
  promptTemplate: 'Assess: {content}'
};

const serverError = () => new ProviderCallError('server', 'API returned error: 503 - overloaded', { statusCode: 503 });
const hang = () => new Promise<CompletionResult>(() => undefined);

describe('DispatcherService', () => {
  it('serves a repeated request from the cache without calling a provider', async () => {
    const harness = await createDispatchHarness();
    const { provider, adapter } = await harness.addProvider('primary', { priority: 1 });
    adapter.complete.mockResolvedValue(analysisReply());

    const first = await harness.dispatcher.analyze(request);
    const second = await harness.dispatcher.analyze({ ...request, content: '  Chip   export\nrules ' });

    expect(adapter.complete).toHaveBeenCalledTimes(1);
    expect(first).toMatchObject({ cached: false, attempts: 1, providerId: provider.id });
    expect(second).toMatchObject({ cached: true, attempts: 0, providerId: provider.id, fingerprint: first.fingerprint });
    expect(second.result).toEqual({
      isRelevant: true,
      analyticalBriefing: 'New chip export rules announced.',
      confidence: 80
    });
    expect(harness.metrics.recordAnalysisOutcome).toHaveBeenLastCalledWith('cache_hit');
  });

  it('skips an unavailable provider and caches the answer of the available one', async () => {
    const harness = await createDispatchHarness();
    const p1 = await harness.addProvider('p1', { priority: 1 });
    const p2 = await harness.addProvider('p2', { priority: 2 });
    await harness.registry.updateHealth(p1.provider.id, healthResult(p1.provider, false));
    await harness.registry.updateHealth(p2.provider.id, healthResult(p2.provider, true));
    p2.adapter.complete.mockResolvedValue(analysisReply());

    const outcome = await harness.dispatcher.analyze(request);

    expect(p1.adapter.complete).not.toHaveBeenCalled();
    expect(p2.adapter.complete).toHaveBeenCalledTimes(1);
    expect(outcome.providerId).toBe(p2.provider.id);

    const cached = await harness.cache.lookup(outcome.fingerprint);
    expect(cached.hit).toBe(true);
    expect(cached.hit && cached.entry.providerId).toBe(p2.provider.id);
  });

  it('fails over to the next provider after a server error', async () => {
    const harness = await createDispatchHarness();
    const p1 = await harness.addProvider('primary', { priority: 1 });
    const p2 = await harness.addProvider('secondary', { priority: 2 });
    p1.adapter.complete.mockRejectedValue(serverError());
    p2.adapter.complete.mockResolvedValue(analysisReply());

    const outcome = await harness.dispatcher.analyze(request);
    await harness.requestLog.flush();

    expect(outcome).toMatchObject({ providerId: p2.provider.id, attempts: 2, cached: false });
    expect(harness.registry.get(p1.provider.id)?.stats).toMatchObject({
      usageCount: 1,
      errorCount: 1,
      lastError: 'API returned error: 503 - overloaded'
    });
    expect(harness.registry.get(p2.provider.id)?.stats).toMatchObject({ usageCount: 1, successCount: 1 });
    expect(harness.metrics.recordFailover).toHaveBeenCalledWith(p1.provider.id, 'server');
    expect(harness.requestLogRepository.entries.map(entry => [entry.providerId, entry.isSuccess, entry.errorCategory])).toEqual([
      [p1.provider.id, false, 'server'],
      [p2.provider.id, true, undefined]
    ]);
  });

  it('moves on after an authentication failure without retrying the same provider', async () => {
    const harness = await createDispatchHarness();
    const p1 = await harness.addProvider('primary', { priority: 1 });
    const p2 = await harness.addProvider('secondary', { priority: 2 });
    p1.adapter.complete.mockRejectedValue(
      new ProviderCallError('auth', 'API returned error: 401 - invalid key', { statusCode: 401 })
    );
    p2.adapter.complete.mockResolvedValue(analysisReply());

    const outcome = await harness.dispatcher.analyze(request);

    expect(p1.adapter.complete).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({ providerId: p2.provider.id, attempts: 2 });
  });

  it('retries the same provider once after a malformed answer', async () => {
    const harness = await createDispatchHarness();
    const p1 = await harness.addProvider('primary', { priority: 1 });
    const p2 = await harness.addProvider('secondary', { priority: 2 });
    p1.adapter.complete
      .mockResolvedValueOnce({ content: 'I think this post is relevant.' })
      .mockResolvedValueOnce(analysisReply({ is_relevant: false }));

    const outcome = await harness.dispatcher.analyze(request);

    expect(p1.adapter.complete).toHaveBeenCalledTimes(2);
    expect(p2.adapter.complete).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ providerId: p1.provider.id, attempts: 2 });
    expect(outcome.result.isRelevant).toBe(false);
  });

  it('fails over after two malformed answers from the same provider', async () => {
    const harness = await createDispatchHarness();
    const p1 = await harness.addProvider('primary', { priority: 1 });
    const p2 = await harness.addProvider('secondary', { priority: 2 });
    p1.adapter.complete.mockResolvedValue({ content: '{"summary": "missing fields"}' });
    p2.adapter.complete.mockResolvedValue(analysisReply());

    const outcome = await harness.dispatcher.analyze(request);

    expect(p1.adapter.complete).toHaveBeenCalledTimes(2);
    expect(outcome).toMatchObject({ providerId: p2.provider.id, attempts: 3 });
    expect(harness.metrics.recordFailover).toHaveBeenCalledWith(p1.provider.id, 'parse');
  });

  it('raises all_providers_exhausted with the last failure and caches nothing', async () => {
    const harness = await createDispatchHarness();
    const p1 = await harness.addProvider('primary', { priority: 1 });
    const p2 = await harness.addProvider('secondary', { priority: 2 });
    p1.adapter.complete.mockRejectedValue(serverError());
    p2.adapter.complete.mockRejectedValue(
      new ProviderCallError('rate_limit', 'API returned error: 429 - slow down', { statusCode: 429 })
    );

    await expect(harness.dispatcher.analyze(request)).rejects.toMatchObject({
      name: 'DispatchError',
      code: 'all_providers_exhausted',
      message: 'All providers exhausted after 2 attempt(s): every eligible provider failed',
      lastError: { category: 'rate_limit', providerId: p2.provider.id },
      attempts: [
        { providerName: 'primary', category: 'server' },
        { providerName: 'secondary', category: 'rate_limit' }
      ]
    });
    expect(await harness.cacheStore.count()).toBe(0);
    expect(harness.metrics.recordAnalysisOutcome).toHaveBeenLastCalledWith('all_providers_exhausted');
  });

  it('stops once the attempt budget is spent', async () => {
    const harness = await createDispatchHarness({ maxAttempts: 2 });
    const providers = await Promise.all([
      harness.addProvider('first', { priority: 1 }),
      harness.addProvider('second', { priority: 2 }),
      harness.addProvider('third', { priority: 3 })
    ]);
    for (const { adapter } of providers) {
      adapter.complete.mockRejectedValue(serverError());
    }

    await expect(harness.dispatcher.analyze(request)).rejects.toMatchObject({
      code: 'all_providers_exhausted',
      message: 'All providers exhausted after 2 attempt(s): attempt budget of 2 used'
    });
    expect(providers[2]?.adapter.complete).not.toHaveBeenCalled();
  });

  it('gives up when the request deadline passes during an attempt', async () => {
    const harness = await createDispatchHarness({ requestDeadlineMs: 50, attemptTimeoutMs: 5000 });
    const p1 = await harness.addProvider('slow', { priority: 1 });
    const p2 = await harness.addProvider('spare', { priority: 2 });
    p1.adapter.complete.mockImplementation(hang);
    p2.adapter.complete.mockResolvedValue(analysisReply());

    await expect(harness.dispatcher.analyze(request)).rejects.toMatchObject({
      code: 'all_providers_exhausted',
      message: 'All providers exhausted after 1 attempt(s): request deadline exceeded',
      lastError: { category: 'timeout' }
    });
    expect(p2.adapter.complete).not.toHaveBeenCalled();
  });

  it('times out a single slow attempt and fails over', async () => {
    const harness = await createDispatchHarness({ requestDeadlineMs: 5000, attemptTimeoutMs: 30 });
    const p1 = await harness.addProvider('slow', { priority: 1 });
    const p2 = await harness.addProvider('fast', { priority: 2 });
    p1.adapter.complete.mockImplementation(hang);
    p2.adapter.complete.mockResolvedValue(analysisReply());

    const outcome = await harness.dispatcher.analyze(request);

    expect(outcome).toMatchObject({ providerId: p2.provider.id, attempts: 2 });
    expect(harness.registry.get(p1.provider.id)?.stats.errorCount).toBe(1);
    expect(harness.metrics.recordFailover).toHaveBeenCalledWith(p1.provider.id, 'timeout');
  });

  it('raises no_eligible_provider when nothing supports the media type', async () => {
    const harness = await createDispatchHarness();
    await harness.addProvider('text-only', { priority: 1 });
    await harness.addProvider('switched-off', { priority: 2, supportsImage: true, isActive: false });

    const failure = harness.dispatcher.analyze({ ...request, mediaType: 'image', mediaUrls: ['https://cdn.example.test/a.png'] });

    await expect(failure).rejects.toBeInstanceOf(DispatchError);
    await expect(failure).rejects.toMatchObject({
      code: 'no_eligible_provider',
      message: 'No eligible provider for media type "image"',
      attempts: []
    });
  });

  it('sends the rendered prompt and the image urls to the provider', async () => {
    const harness = await createDispatchHarness();
    const { adapter } = await harness.addProvider('vision', { supportsImage: true });
    adapter.complete.mockResolvedValue(analysisReply());

    await harness.dispatcher.analyze({
      content: 'caption',
      mediaType: 'image',
      promptTemplate: 'Assess: {content}',
      mediaUrls: ['https://cdn.example.test/a.png']
    });

    expect(adapter.complete.mock.calls[0]?.[0]).toEqual({
      systemPrompt: ANALYSIS_SYSTEM_PROMPT,
      prompt: 'Assess: caption',
      imageUrls: ['https://cdn.example.test/a.png']
    });
  });

  it('calls the provider every time when the cache is disabled', async () => {
    const harness = await createDispatchHarness({ cacheEnabled: false });
    const { adapter } = await harness.addProvider('primary');
    adapter.complete.mockResolvedValue(analysisReply());

    await harness.dispatcher.analyze(request);
    await harness.dispatcher.analyze(request);

    expect(adapter.complete).toHaveBeenCalledTimes(2);
    expect(await harness.cacheStore.count()).toBe(0);
  });

  it('still answers when usage statistics cannot be persisted', async () => {
    const harness = await createDispatchHarness();
    const { provider, adapter } = await harness.addProvider('primary');
    adapter.complete.mockResolvedValue(analysisReply());
    harness.providerRepository.failWrites = true;

    const outcome = await harness.dispatcher.analyze(request);

    expect(outcome.providerId).toBe(provider.id);
    expect(harness.metrics.recordError).toHaveBeenCalledWith('stats_write_failed', 'stats_tracker');
  });

  it('treats a failing cache read as a miss and still answers', async () => {
    const harness = await createDispatchHarness();
    const { provider, adapter } = await harness.addProvider('primary', { priority: 1 });
    adapter.complete.mockResolvedValue(analysisReply());
    jest.spyOn(harness.cacheStore, 'get').mockRejectedValue(new Error('cache backend down'));

    const outcome = await harness.dispatcher.analyze(request);

    expect(outcome).toMatchObject({ cached: false, attempts: 1, providerId: provider.id });
    expect(adapter.complete).toHaveBeenCalledTimes(1);
    expect(harness.metrics.recordError).toHaveBeenCalledWith('cache_read_failed', 'dispatcher');
  });

  it('returns the provider answer when it cannot be cached', async () => {
    const harness = await createDispatchHarness();
    const { provider, adapter } = await harness.addProvider('primary', { priority: 1 });
    adapter.complete.mockResolvedValue(analysisReply());
    jest.spyOn(harness.cacheStore, 'set').mockRejectedValue(new Error('cache backend down'));

    const outcome = await harness.dispatcher.analyze(request);

    expect(outcome).toMatchObject({ cached: false, attempts: 1, providerId: provider.id });
    expect(outcome.result.analyticalBriefing).toBe('New chip export rules announced.');
    expect(harness.metrics.recordAnalysisOutcome).toHaveBeenLastCalledWith('success');
    expect(harness.metrics.recordError).toHaveBeenCalledWith('cache_write_failed', 'dispatcher');
  });
});
