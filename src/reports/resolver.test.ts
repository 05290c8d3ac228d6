import { afterEach, describe, expect, it, vi } from 'vitest';
import { computeReportId, DEFAULT_REPORT_BASE_URI, ResolutionError, resolveReport } from './resolver.js';
import { createKnowledgeBase, createRawReport } from '../testing/fixtures.js';

const FIXED_NOW = () => new Date('2024-06-01T12:00:00Z');

describe('computeReportId', () => {
  it('should be deterministic for the same content', () => {
    const first = computeReportId(createRawReport());
    const second = computeReportId(createRawReport());

    expect(first).toBe(second);
    expect(first).toMatch(/^[0-9a-f]{16}$/);
  });

  it('should change when any field changes', () => {
    const base = computeReportId(createRawReport());

    expect(computeReportId(createRawReport({ flaw_severity: 'Low' }))).not.toBe(base);
    expect(computeReportId(createRawReport({ ai_systems: ['orbit'] }))).not.toBe(base);
    expect(computeReportId(createRawReport({ ai_systems_unknown: [{ description: 'Kiosk assistant' }] }))).not.toBe(base);
    expect(computeReportId(createRawReport({ flaw_description: 'Model hallucinated two citations' }))).not.toBe(base);
  });

  it('should tell slugs and descriptions apart', () => {
    const asSlug = computeReportId(createRawReport({ ai_systems: ['kiosk'], ai_systems_unknown: [] }));
    const asDescription = computeReportId(createRawReport({ ai_systems: [], ai_systems_unknown: [{ description: 'kiosk' }] }));

    expect(asSlug).not.toBe(asDescription);
  });
});

describe('resolveReport', () => {
  const kb = createKnowledgeBase();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should resolve known systems from the knowledge base', () => {
    const report = resolveReport(createRawReport(), kb, { now: FIXED_NOW });

    expect(report).toEqual({
      reportId: computeReportId(createRawReport()),
      createdAt: '2024-06-01T12:00:00.000Z',
      aiSystems: [
        {
          kind: 'known',
          id: 'https://example.org/systems/gpt-x',
          name: 'GPT-X',
          version: '1.0',
          slug: 'gpt-x',
          displayName: 'Acme GPT-X'
        }
      ],
      flawDescription: 'Model hallucinated a citation',
      flawSeverity: 'High'
    });
  });

  it('should stringify numeric versions and fall back to the public name', () => {
    const kbWithNameless = createKnowledgeBase({
      systems: [
        {
          '@id': 'https://example.org/systems/nameless',
          name: 'Nameless',
          _aifr_internal: { slug: 'nameless' }
        },
        {
          '@id': 'https://example.org/systems/numbered',
          name: 'Numbered',
          version: 3,
          _aifr_internal: { slug: 'numbered', displayName: 'Numbered Model' }
        }
      ]
    });

    const report = resolveReport(createRawReport({ ai_systems: ['nameless', 'numbered'] }), kbWithNameless);

    expect(report.aiSystems).toEqual([
      { kind: 'known', id: 'https://example.org/systems/nameless', name: 'Nameless', version: '', slug: 'nameless', displayName: 'Nameless' },
      { kind: 'known', id: 'https://example.org/systems/numbered', name: 'Numbered', version: '3', slug: 'numbered', displayName: 'Numbered Model' }
    ]);
  });

  it('should give unknown systems synthetic ids under the report id', () => {
    const raw = createRawReport({
      ai_systems: [],
      ai_systems_unknown: [{ description: 'A chatbot on a website' }, { description: 'A voice assistant' }]
    });
    const reportId = computeReportId(raw);

    const report = resolveReport(raw, kb);

    expect(report.aiSystems).toEqual([
      {
        kind: 'unknown',
        id: `${DEFAULT_REPORT_BASE_URI}/${reportId}/unknown-system-1`,
        displayName: 'Unknown System',
        description: 'A chatbot on a website'
      },
      {
        kind: 'unknown',
        id: `${DEFAULT_REPORT_BASE_URI}/${reportId}/unknown-system-2`,
        displayName: 'Unknown System',
        description: 'A voice assistant'
      }
    ]);
  });

  it('should use the configured base URI', () => {
    const raw = createRawReport({ ai_systems: [], ai_systems_unknown: [{ description: 'A chatbot on a website' }] });

    const report = resolveReport(raw, kb, { baseUri: 'https://reports.example.org/flaws' });

    expect(report.aiSystems[0].id).toBe(`https://reports.example.org/flaws/${report.reportId}/unknown-system-1`);
  });

  it('should place known systems before unknown ones and keep duplicates', () => {
    const raw = createRawReport({
      ai_systems: ['orbit', 'gpt-x', 'orbit'],
      ai_systems_unknown: [{ description: 'A chatbot on a website' }]
    });

    const report = resolveReport(raw, kb);

    expect(report.aiSystems.map(system => system.kind)).toEqual(['known', 'known', 'known', 'unknown']);
    expect(report.aiSystems.map(system => system.displayName)).toEqual([
      'orbit assistant',
      'Acme GPT-X',
      'orbit assistant',
      'Unknown System'
    ]);
  });

  it('should drop slugs missing from the knowledge base and report them', () => {
    const onUnresolvedSlug = vi.fn();
    const raw = createRawReport({ ai_systems: ['nonexistent-slug', 'gpt-x'] });

    const report = resolveReport(raw, kb, { onUnresolvedSlug });

    expect(onUnresolvedSlug).toHaveBeenCalledWith('nonexistent-slug');
    expect(report.aiSystems).toHaveLength(1);
    expect(report.aiSystems[0].id).toBe('https://example.org/systems/gpt-x');
  });

  it('should log dropped slugs by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    resolveReport(createRawReport({ ai_systems: ['nonexistent-slug', 'gpt-x'] }), kb);

    expect(warn).toHaveBeenCalledWith('[Resolver] Dropping unknown system slug: nonexistent-slug');
  });

  it('should not resolve organization slugs as systems', () => {
    const onUnresolvedSlug = vi.fn();
    const raw = createRawReport({ ai_systems: ['acme', 'gpt-x'] });

    resolveReport(raw, kb, { onUnresolvedSlug });

    expect(onUnresolvedSlug).toHaveBeenCalledWith('acme');
  });

  it('should fail when every slug is dropped and there are no unknown systems', () => {
    const raw = createRawReport({ ai_systems: ['nonexistent-slug'] });

    try {
      resolveReport(raw, kb, { onUnresolvedSlug: () => undefined });
      expect.unreachable('resolveReport should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ResolutionError);
      if (err instanceof ResolutionError) {
        expect(err.reportId).toBe(computeReportId(raw));
        expect(err.unresolvedSlugs).toEqual(['nonexistent-slug']);
      }
    }
  });

  it('should return a frozen report', () => {
    const report = resolveReport(createRawReport(), kb);

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.aiSystems)).toBe(true);
    expect(Object.isFrozen(report.aiSystems[0])).toBe(true);
  });
});
