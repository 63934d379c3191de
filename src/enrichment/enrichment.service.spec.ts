import Groq from 'groq-sdk';
import {
  ChatCompletionClient,
  CompletionRequest,
  CompletionResponse,
  GroqService,
} from '../ai/groq.service';
import { InMemorySubmissionsRepository } from '../test-utils/in-memory-submissions.repository';
import { createTestConfig } from '../test-utils/test-config';
import { EnrichmentService } from './enrichment.service';
import { HeuristicClassifierService } from './heuristic-classifier.service';

describe('EnrichmentService', () => {
  let repository: InMemorySubmissionsRepository;
  let heuristics: HeuristicClassifierService;
  let create: jest.Mock<Promise<CompletionResponse>, [CompletionRequest]>;

  function createService(withClient: boolean): EnrichmentService {
    const config = createTestConfig(withClient ? { GROQ_API_KEY: 'test-key' } : {});
    const client: ChatCompletionClient = { chat: { completions: { create } } };
    return new EnrichmentService(
      repository,
      new GroqService(config, withClient ? client : null),
      heuristics,
    );
  }

  beforeEach(() => {
    repository = new InMemorySubmissionsRepository();
    heuristics = new HeuristicClassifierService(createTestConfig());
    create = jest.fn<Promise<CompletionResponse>, [CompletionRequest]>();
  });

  it('uses heuristics when no remote classifier is configured', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });

    await expect(createService(false).enrich(1)).resolves.toBe('done');

    expect(repository.store.findSubmission(1)).toMatchObject({
      enrichmentStatus: 'done',
      detectedLanguage: 'en',
      translationEn: 'The salary is too low',
      translationRu: '[Требуется перевод] The salary is too low',
      summary: 'The salary is too low',
      tags: 'Salary',
    });
  });

  it('completes whitespace-only messages with empty fields', async () => {
    repository.store.seedSubmission({ id: 1, message: '   ' });

    await expect(createService(true).enrich(1)).resolves.toBe('done');

    expect(create).not.toHaveBeenCalled();
    expect(repository.store.findSubmission(1)).toMatchObject({
      enrichmentStatus: 'done',
      detectedLanguage: 'unknown',
      translationEn: '',
      translationRu: '',
      summary: '',
      tags: '',
    });
  });

  it('stores the remote classification', async () => {
    repository.store.seedSubmission({ id: 1, message: 'เงินเดือนน้อยเกินไป' });
    create.mockResolvedValue({
      choices: [
        {
          message: {
            content: JSON.stringify({
              detected_language: 'th',
              translation_en: 'The salary is too low',
              translation_ru: 'Зарплата слишком низкая',
              summary: 'Low salary',
              tags: ['Salary', 'Store'],
            }),
          },
        },
      ],
    });

    await expect(createService(true).enrich(1)).resolves.toBe('done');

    expect(repository.store.findSubmission(1)).toMatchObject({
      enrichmentStatus: 'done',
      detectedLanguage: 'th',
      translationEn: 'The salary is too low',
      translationRu: 'Зарплата слишком низкая',
      summary: 'Low salary',
      tags: 'Salary,Store',
    });
  });

  it('falls back to heuristics when the remote call fails', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });
    create.mockRejectedValue(new Groq.APIConnectionError({ message: 'socket hang up' }));

    await expect(createService(true).enrich(1)).resolves.toBe('done');

    expect(repository.store.findSubmission(1)).toMatchObject({
      enrichmentStatus: 'done',
      detectedLanguage: 'en',
      tags: 'Salary',
    });
  });

  it('falls back to heuristics on a malformed response', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });
    create.mockResolvedValue({ choices: [{ message: { content: 'not json' } }] });

    await expect(createService(true).enrich(1)).resolves.toBe('done');

    expect(repository.store.findSubmission(1)?.tags).toBe('Salary');
  });

  it('falls back to heuristics when the language does not fit the column', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });
    create.mockResolvedValue({
      choices: [{ message: { content: '{"detected_language":"Portuguese (Brazil)"}' } }],
    });

    await expect(createService(true).enrich(1)).resolves.toBe('done');

    expect(repository.store.findSubmission(1)).toMatchObject({
      enrichmentStatus: 'done',
      detectedLanguage: 'en',
    });
  });

  it('keeps a claim whose response was lost', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });
    const claim = repository.claimForEnrichment.bind(repository);
    const claimSpy = jest
      .spyOn(repository, 'claimForEnrichment')
      .mockImplementationOnce(async (id: number) => {
        await claim(id);
        throw new Error('fetch failed');
      });

    await expect(createService(false).enrich(1)).resolves.toBe('done');

    expect(claimSpy).toHaveBeenCalledTimes(1);
    expect(repository.store.findSubmission(1)).toMatchObject({
      enrichmentStatus: 'done',
      tags: 'Salary',
    });
  });

  it('claims again when a failed claim left the row pending', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });
    const claimSpy = jest
      .spyOn(repository, 'claimForEnrichment')
      .mockRejectedValueOnce(new Error('fetch failed'));

    await expect(createService(false).enrich(1)).resolves.toBe('done');

    expect(claimSpy).toHaveBeenCalledTimes(2);
    expect(repository.store.findSubmission(1)?.enrichmentStatus).toBe('done');
  });

  it('propagates claim errors that are not transport failures', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });
    jest
      .spyOn(repository, 'claimForEnrichment')
      .mockRejectedValueOnce(new Error('permission denied for table submissions'));

    await expect(createService(false).enrich(1)).rejects.toThrow('permission denied');

    expect(repository.store.findSubmission(1)?.enrichmentStatus).toBe('pending');
  });

  it('fails when the heuristics fail too', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });
    jest.spyOn(heuristics, 'classify').mockImplementation(() => {
      throw new Error('broken keyword table');
    });

    await expect(createService(false).enrich(1)).resolves.toBe('failed');

    expect(repository.store.findSubmission(1)).toMatchObject({
      enrichmentStatus: 'failed',
      detectedLanguage: null,
      tags: null,
    });
  });

  it('fails when storing the result throws', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });
    jest
      .spyOn(repository, 'completeEnrichment')
      .mockRejectedValue(new Error('value too long for column'));

    await expect(createService(false).enrich(1)).resolves.toBe('failed');

    expect(repository.store.findSubmission(1)?.enrichmentStatus).toBe('failed');
  });

  it('discards the result when the row left processing', async () => {
    repository.store.seedSubmission({ id: 1, message: 'The salary is too low' });
    jest.spyOn(repository, 'completeEnrichment').mockResolvedValue(false);

    await expect(createService(false).enrich(1)).resolves.toBe('skipped');
  });

  it('skips missing submissions', async () => {
    await expect(createService(false).enrich(42)).resolves.toBe('skipped');
  });

  it('skips submissions that are not pending', async () => {
    repository.store.seedSubmission({ id: 1, enrichmentStatus: 'done', tags: 'Store' });

    await expect(createService(false).enrich(1)).resolves.toBe('skipped');

    expect(repository.store.findSubmission(1)).toMatchObject({
      enrichmentStatus: 'done',
      tags: 'Store',
    });
  });
});
