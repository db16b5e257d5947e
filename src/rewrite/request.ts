/**
 * Input collection and request validation
 *
 * collectRequest fills in whatever the caller did not supply by asking the
 * prompter; validateRequest turns the loose request into an IdentityRewrite
 * or reports exactly which rule it breaks.
 */

import type {
  IdentityRewrite,
  Prompter,
  Replacement,
  RewriteRequest,
  RewriteResult,
} from './types.js';
import { failure, success } from './types.js';

// ============================================
// EMAIL GRAMMAR
// ============================================

/**
 * local-part@domain.tld with a 2+ letter top-level label
 */
export const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

/**
 * Normalize a field: trim, and map empty to undefined
 */
function field(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// ============================================
// COLLECTION
// ============================================

type ChangeChoice = 'email' | 'name' | 'both';

/**
 * Produce a request with every prompt-able gap filled in
 *
 * With no identity field seeded, a menu decides what to change. With any
 * field seeded, only the missing half of a pair is asked for; a seeded
 * old email alone also offers to change the name. Returns InvalidInput
 * when the menu answer matches no option.
 */
export async function collectRequest(
  seed: RewriteRequest,
  prompter: Prompter
): Promise<RewriteResult<RewriteRequest>> {
  let oldEmail = field(seed.oldEmail);
  let newEmail = field(seed.newEmail);
  let oldName = field(seed.oldName);
  let newName = field(seed.newName);

  if (!oldEmail && !newEmail && !oldName && !newName) {
    const choice = await prompter.select<ChangeChoice>('What would you like to change?', [
      { label: 'Email address only', value: 'email' },
      { label: 'Name only', value: 'name' },
      { label: 'Both email and name', value: 'both' },
    ]);

    if (choice === null) {
      return failure('InvalidInput', 'Invalid choice');
    }

    if (choice === 'email' || choice === 'both') {
      oldEmail = field(await prompter.ask('Enter the OLD email address to replace:'));
      newEmail = field(await prompter.ask('Enter the NEW email address:'));
    }

    if (choice === 'name' || choice === 'both') {
      oldName = field(await prompter.ask('Enter the OLD name to replace:'));
      newName = field(await prompter.ask('Enter the NEW name:'));
    }
  } else {
    if (!oldEmail && !oldName) {
      oldEmail = field(await prompter.ask('Enter the OLD email address to replace:'));
    }

    if (oldEmail && !newEmail) {
      newEmail = field(await prompter.ask('Enter the NEW email address:'));
    } else if (!oldEmail && newEmail) {
      oldEmail = field(await prompter.ask('Enter the OLD email address to replace:'));
    }

    if (oldName && !newName) {
      newName = field(await prompter.ask('Enter the NEW name:'));
    } else if (!oldName && newName) {
      oldName = field(await prompter.ask('Enter the OLD name to replace:'));
    } else if (!oldName && !newName && oldEmail) {
      const changeName = await prompter.confirm('Do you also want to change the author/committer name?', false);
      if (changeName) {
        oldName = field(await prompter.ask('Enter the OLD name to replace (leave empty to skip):'));
        if (oldName) {
          newName = field(await prompter.ask('Enter the NEW name:'));
        }
      }
    }
  }

  return success({
    repositoryPath: field(seed.repositoryPath),
    oldEmail,
    newEmail,
    oldName,
    newName,
  });
}

// ============================================
// VALIDATION
// ============================================

/**
 * Check email grammar and pairing rules
 *
 * Email format is checked first (old, then new) so a typo is reported as
 * such rather than as a pairing problem.
 */
export function validateRequest(request: RewriteRequest): RewriteResult<IdentityRewrite> {
  const oldEmail = field(request.oldEmail);
  const newEmail = field(request.newEmail);
  const oldName = field(request.oldName);
  const newName = field(request.newName);

  if (oldEmail !== undefined && !isValidEmail(oldEmail)) {
    return failure('InvalidEmailFormat', `Invalid old email format: ${oldEmail}`, ['field: oldEmail']);
  }

  if (newEmail !== undefined && !isValidEmail(newEmail)) {
    return failure('InvalidEmailFormat', `Invalid new email format: ${newEmail}`, ['field: newEmail']);
  }

  if (oldEmail === undefined && oldName === undefined) {
    return failure('InvalidInput', 'Must specify either OLD_EMAIL or OLD_NAME to change');
  }

  if (oldEmail !== undefined && newEmail === undefined) {
    return failure('InvalidInput', 'NEW_EMAIL must be provided when OLD_EMAIL is specified');
  }

  if (oldEmail === undefined && newEmail !== undefined) {
    return failure('InvalidInput', 'OLD_EMAIL must be provided when NEW_EMAIL is specified');
  }

  if (oldName !== undefined && newName === undefined) {
    return failure('InvalidInput', 'NEW_NAME must be provided when OLD_NAME is specified');
  }

  if (oldName === undefined && newName !== undefined) {
    return failure('InvalidInput', 'OLD_NAME must be provided when NEW_NAME is specified');
  }

  const email: Replacement | undefined =
    oldEmail !== undefined && newEmail !== undefined ? { from: oldEmail, to: newEmail } : undefined;
  const name: Replacement | undefined =
    oldName !== undefined && newName !== undefined ? { from: oldName, to: newName } : undefined;

  if (email) {
    return success(name ? { email, name } : { email });
  }
  if (name) {
    return success({ name });
  }

  // Unreachable: the checks above guarantee at least one pair
  return failure('InvalidInput', 'Nothing to change');
}

/**
 * Preview lines shown before the final confirmation
 */
export function describeRewrite(rewrite: IdentityRewrite): string[] {
  const lines: string[] = [];
  if (rewrite.email) {
    lines.push(`OLD EMAIL: ${rewrite.email.from}`);
    lines.push(`NEW EMAIL: ${rewrite.email.to}`);
  }
  if (rewrite.name) {
    lines.push(`OLD NAME:  ${rewrite.name.from}`);
    lines.push(`NEW NAME:  ${rewrite.name.to}`);
  }
  return lines;
}
