import { describe, it, expect } from 'vitest';
import { collectRequest, describeRewrite, isValidEmail, validateRequest } from './request.js';
import { ScriptedPrompter } from '../testing/fixtures.js';

describe('isValidEmail', () => {
  it.each(['a@b.co', 'first.last+tag@mail.example.org', 'x_y%z-1@sub-domain.example.io'])('accepts %s', (email) => {
    expect(isValidEmail(email)).toBe(true);
  });

  it.each(['plain', 'a@b', 'a@.com', 'a@b.c', '@example.com', 'a b@example.com', 'a@example.c0m'])('rejects %s', (email) => {
    expect(isValidEmail(email)).toBe(false);
  });
});

describe('collectRequest', () => {
  it('asks what to change when nothing is seeded', async () => {
    const prompter = new ScriptedPrompter({
      selections: [0],
      answers: ['old@example.com', 'new@example.com'],
    });

    const result = await collectRequest({}, prompter);

    expect(result).toEqual({
      ok: true,
      value: { oldEmail: 'old@example.com', newEmail: 'new@example.com' },
    });
    expect(prompter.questions).toEqual([
      'What would you like to change?',
      'Enter the OLD email address to replace:',
      'Enter the NEW email address:',
    ]);
  });

  it('collects both pairs from the menu', async () => {
    const prompter = new ScriptedPrompter({
      selections: [2],
      answers: ['old@example.com', 'new@example.com', 'Old Name', 'New Name'],
    });

    const result = await collectRequest({ repositoryPath: '  /srv/repo ' }, prompter);

    expect(result).toEqual({
      ok: true,
      value: {
        repositoryPath: '/srv/repo',
        oldEmail: 'old@example.com',
        newEmail: 'new@example.com',
        oldName: 'Old Name',
        newName: 'New Name',
      },
    });
  });

  it('fails on a menu answer that matches no option', async () => {
    const result = await collectRequest({}, new ScriptedPrompter({ selections: [null] }));
    expect(result).toEqual({ ok: false, error: { kind: 'InvalidInput', message: 'Invalid choice' } });
  });

  it('skips all prompts when every requested pair is seeded', async () => {
    const prompter = new ScriptedPrompter();
    const result = await collectRequest({ oldName: 'Old Name', newName: 'New Name' }, prompter);

    expect(result.ok).toBe(true);
    expect(prompter.questions).toEqual([]);
  });

  it('asks only for the missing half of a seeded email', async () => {
    const prompter = new ScriptedPrompter({ answers: ['new@example.com'] });
    const result = await collectRequest({ oldEmail: 'old@example.com' }, prompter);

    expect(result).toEqual({
      ok: true,
      value: { oldEmail: 'old@example.com', newEmail: 'new@example.com' },
    });
    expect(prompter.questions).toEqual([
      'Enter the NEW email address:',
      'Do you also want to change the author/committer name?',
    ]);
  });

  it('offers a name change alongside a seeded email', async () => {
    const prompter = new ScriptedPrompter({
      confirms: [true],
      answers: ['Old Name', 'New Name'],
    });
    const result = await collectRequest({ oldEmail: 'old@example.com', newEmail: 'new@example.com' }, prompter);

    expect(result).toEqual({
      ok: true,
      value: {
        oldEmail: 'old@example.com',
        newEmail: 'new@example.com',
        oldName: 'Old Name',
        newName: 'New Name',
      },
    });
  });

  it('asks for the old email when only the new one is seeded', async () => {
    const prompter = new ScriptedPrompter({ answers: ['old@example.com'] });
    const result = await collectRequest({ newEmail: 'new@example.com' }, prompter);

    expect(result.ok && result.value.oldEmail).toBe('old@example.com');
    expect(prompter.questions[0]).toBe('Enter the OLD email address to replace:');
  });

  it('treats blank answers as missing', async () => {
    const prompter = new ScriptedPrompter({ answers: ['   '] });
    const result = await collectRequest({ oldEmail: 'old@example.com' }, prompter);

    expect(result.ok && result.value.newEmail).toBeUndefined();
  });
});

describe('validateRequest', () => {
  it('accepts an email-only request', () => {
    expect(validateRequest({ oldEmail: 'old@example.com', newEmail: 'new@example.com' })).toEqual({
      ok: true,
      value: { email: { from: 'old@example.com', to: 'new@example.com' } },
    });
  });

  it('accepts a name-only request', () => {
    expect(validateRequest({ oldName: 'Old', newName: 'New' })).toEqual({
      ok: true,
      value: { name: { from: 'Old', to: 'New' } },
    });
  });

  it('accepts both pairs', () => {
    const result = validateRequest({
      oldEmail: 'old@example.com',
      newEmail: 'new@example.com',
      oldName: 'Old',
      newName: 'New',
    });
    expect(result).toEqual({
      ok: true,
      value: {
        email: { from: 'old@example.com', to: 'new@example.com' },
        name: { from: 'Old', to: 'New' },
      },
    });
  });

  it('rejects a malformed old email before pairing', () => {
    expect(validateRequest({ oldEmail: 'not-an-email' })).toEqual({
      ok: false,
      error: {
        kind: 'InvalidEmailFormat',
        message: 'Invalid old email format: not-an-email',
        details: ['field: oldEmail'],
      },
    });
  });

  it('rejects a malformed new email', () => {
    const result = validateRequest({ oldEmail: 'old@example.com', newEmail: 'new@example' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidEmailFormat');
      expect(result.error.details).toEqual(['field: newEmail']);
    }
  });

  it.each([
    [{}, 'Must specify either OLD_EMAIL or OLD_NAME to change'],
    [{ newName: 'New' }, 'Must specify either OLD_EMAIL or OLD_NAME to change'],
    [{ oldEmail: 'old@example.com' }, 'NEW_EMAIL must be provided when OLD_EMAIL is specified'],
    [{ oldName: 'Old', newEmail: 'new@example.com' }, 'OLD_EMAIL must be provided when NEW_EMAIL is specified'],
    [{ oldEmail: 'old@example.com', newEmail: 'new@example.com', oldName: 'Old' }, 'NEW_NAME must be provided when OLD_NAME is specified'],
    [{ oldEmail: 'old@example.com', newEmail: 'new@example.com', newName: 'New' }, 'OLD_NAME must be provided when NEW_NAME is specified'],
    [{ oldEmail: 'old@example.com', newEmail: '   ' }, 'NEW_EMAIL must be provided when OLD_EMAIL is specified'],
  ])('rejects unpaired input %j', (request, message) => {
    expect(validateRequest(request)).toEqual({ ok: false, error: { kind: 'InvalidInput', message } });
  });
});

describe('describeRewrite', () => {
  it('lists the old and new values', () => {
    expect(
      describeRewrite({
        email: { from: 'old@example.com', to: 'new@example.com' },
        name: { from: 'Old', to: 'New' },
      })
    ).toEqual([
      'OLD EMAIL: old@example.com',
      'NEW EMAIL: new@example.com',
      'OLD NAME:  Old',
      'NEW NAME:  New',
    ]);
  });
});
