import { matchesAny, subjectMatches } from '../../src/application/subject-filter.js';

describe('subjectMatches', () => {
  it('matches literal subjects exactly', () => {
    expect(subjectMatches('academic.course.created', 'academic.course.created')).toBe(true);
    expect(subjectMatches('academic.course.created', 'academic.course.deleted')).toBe(false);
    expect(subjectMatches('academic.course', 'academic.course.created')).toBe(false);
  });

  it('* matches exactly one token', () => {
    expect(subjectMatches('academic.course.*', 'academic.course.created')).toBe(true);
    expect(subjectMatches('academic.*.created', 'academic.exam.created')).toBe(true);
    expect(subjectMatches('academic.course.*', 'academic.course')).toBe(false);
    expect(subjectMatches('academic.course.*', 'academic.course.created.v2')).toBe(false);
  });

  it('> matches one or more trailing tokens', () => {
    expect(subjectMatches('academic.>', 'academic.course.created')).toBe(true);
    expect(subjectMatches('academic.>', 'academic.course')).toBe(true);
    expect(subjectMatches('academic.>', 'academic')).toBe(false);
    expect(subjectMatches('>', 'notes')).toBe(true);
  });

  it('> is only a wildcard in last position', () => {
    expect(subjectMatches('academic.>.created', 'academic.course.created')).toBe(false);
  });
});

describe('matchesAny', () => {
  it('treats an empty pattern list as match-all', () => {
    expect(matchesAny([], 'notes.created')).toBe(true);
  });

  it('matches when any pattern does', () => {
    const patterns = ['academic.exam.*', 'academic.quiz.*'];
    expect(matchesAny(patterns, 'academic.quiz.updated')).toBe(true);
    expect(matchesAny(patterns, 'academic.course.updated')).toBe(false);
  });
});
