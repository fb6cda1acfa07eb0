import { describe, it, expect } from 'vitest';
import { CancelledError, EmptyDocumentError, ProviderUnavailableError } from '@resumekit/llm';
import { ResumeExtractionAgent, type ExtractedText } from '@resumekit/agents';
import { FixedProvider, ScriptedProvider } from './stub-provider.js';

const SAMPLE_RESUME_TEXT = `RAHIM UDDIN
rahim@example.com | +880 1700 000000
House 12, Road 5, Dhanmondi, Dhaka 1209

EDUCATION
B.Sc. in Computer Science, BUET, 2017, CGPA 3.61

EXPERIENCE
Software Engineer, Acme Ltd (Software), Jan 2020 - Present
- Built billing APIs

SKILLS
TypeScript, Go, PostgreSQL`;

const MODEL_REPLY = JSON.stringify({
  personal_info: { name: 'Rahim Uddin', email: 'rahim@example.com', phone: '+880 1700 000000' },
  addresses: [
    { type: 'present', address: 'House 12, Road 5, Dhanmondi', post_name: 'Dhaka', post_code: '1209' },
  ],
  academic_education: [
    {
      levels: 'bachelors',
      subject: 'Computer Science',
      board: 'BUET',
      institute: 'BUET',
      passing_year: '2017',
      result: 'CGPA 3.61',
    },
  ],
  employment: [
    {
      company_name: 'Acme Ltd',
      company_type: 'Software',
      position: 'Software Engineer',
      joining_date: 'Jan 2020',
      leaving_date: 'Present',
      currently_working: true,
      responsibility: 'Built billing APIs',
    },
  ],
  skills: ['TypeScript', 'Go', 'PostgreSQL'],
});

const readSample = async (): Promise<ExtractedText> => ({ text: SAMPLE_RESUME_TEXT, numPages: 1 });

describe('ResumeExtractionAgent', () => {
  it('extracts a record from a resume file', async () => {
    const provider = new ScriptedProvider([MODEL_REPLY]);
    const agent = new ResumeExtractionAgent(provider, { readText: readSample });

    const result = await agent.execute({ filePath: 'resumes/rahim.pdf' }, { runId: 'run-1' });

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({ sourceFile: 'resumes/rahim.pdf', model: 'stub-model', attempts: 1 });
    expect(result.data?.record.employment[0]).toMatchObject({
      currently_working: true,
      leaving_date: '',
    });
    expect(result.data?.record.academic_education[0].levels).toBe('bachelors');
    expect(result.data?.warnings).toEqual([
      {
        path: 'employment.0.leaving_date',
        code: 'invariant_fixed',
        message: 'Cleared leaving_date "Present" because currently_working is true',
        value: 'Present',
      },
    ]);
    expect(result.context.runId).toBe('run-1');
    expect(provider.calls[0].prompt).toContain(SAMPLE_RESUME_TEXT);
  });

  it('returns a deep-frozen record', async () => {
    const agent = new ResumeExtractionAgent(new ScriptedProvider(['{"skills":["Go"]}']), {
      readText: readSample,
    });

    const result = await agent.execute({ filePath: 'resumes/rahim.pdf' });

    expect(result.data?.record.skills).toEqual(['Go']);
    expect(Object.isFrozen(result.data?.record)).toBe(true);
    expect(Object.isFrozen(result.data?.record.skills)).toBe(true);
    expect(Object.isFrozen(result.data?.record.personal_info)).toBe(true);
  });

  it('passes model and attempt settings to the orchestrator', async () => {
    const provider = new ScriptedProvider([
      new ProviderUnavailableError('ollama', 'down'),
      MODEL_REPLY,
    ]);
    const agent = new ResumeExtractionAgent(provider, {
      readText: readSample,
      model: 'llama3:8b',
      maxAttempts: 1,
    });

    const result = await agent.execute({ filePath: 'rahim.pdf' });

    expect(result.success).toBe(false);
    expect(result.errorName).toBe('ProviderUnavailableError');
    expect(provider.calls.map((c) => c.model)).toEqual(['llama3:8b']);
  });

  it('returns the classified error instead of throwing', async () => {
    const provider = new ScriptedProvider([MODEL_REPLY]);
    const agent = new ResumeExtractionAgent(provider, {
      readText: async () => ({ text: '', numPages: 1 }),
    });

    const result = await agent.execute({ filePath: 'scanned.pdf' });

    expect(result.success).toBe(false);
    expect(result.error).toBe('Document text is empty');
    expect(result.errorName).toBe('EmptyDocumentError');
    expect(result.cause).toBeInstanceOf(EmptyDocumentError);
    expect(provider.calls).toHaveLength(0);
  });

  it('keeps logs per execution', async () => {
    const agent = new ResumeExtractionAgent(new FixedProvider(async () => MODEL_REPLY), {
      readText: readSample,
    });

    const [first, second] = await Promise.all([
      agent.execute({ filePath: 'a.pdf' }),
      agent.execute({ filePath: 'b.pdf' }),
    ]);

    const started = (logs: typeof first.logs) =>
      logs.filter((log) => log.message === 'Extracting text from resume file');
    expect(started(first.logs).map((log) => log.data)).toEqual([{ filePath: 'a.pdf' }]);
    expect(started(second.logs).map((log) => log.data)).toEqual([{ filePath: 'b.pdf' }]);
  });

  it('observes the caller signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const agent = new ResumeExtractionAgent(new ScriptedProvider([MODEL_REPLY]), {
      readText: readSample,
    });

    const result = await agent.execute({ filePath: 'a.pdf' }, { signal: controller.signal });

    expect(result.cause).toBeInstanceOf(CancelledError);
  });

  it('rejects an empty file path', async () => {
    const agent = new ResumeExtractionAgent(new ScriptedProvider([]), { readText: readSample });

    const result = await agent.execute({ filePath: '' });

    expect(result.success).toBe(false);
    expect(result.errorName).toBe('ZodError');
  });
});
