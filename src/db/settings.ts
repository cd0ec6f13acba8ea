/**
 * Typed wrappers over the config key/value table.
 */
import { createHash } from 'crypto';
import type { Theme } from '../domain/types';
import type { LedgerRepo } from './repo';

export const CONFIG_KEYS = {
  pinHash: 'pin_hash',
  theme: 'theme',
  onboardingDone: 'onboarding_completed',
} as const;

function hashPin(pin: string): string {
  return createHash('sha256').update(pin).digest('hex');
}

/** Stores only the SHA-256 of the code */
export function savePin(repo: LedgerRepo, pin: string): boolean {
  return repo.setConfig(CONFIG_KEYS.pinHash, hashPin(pin));
}

export function hasPin(repo: LedgerRepo): boolean {
  return repo.getConfig(CONFIG_KEYS.pinHash) !== null;
}

/** With no PIN configured every code passes */
export function verifyPin(repo: LedgerRepo, pin: string): boolean {
  const stored = repo.getConfig(CONFIG_KEYS.pinHash);
  if (stored === null) return true;
  return stored === hashPin(pin);
}

export function clearPin(repo: LedgerRepo): boolean {
  return repo.deleteConfig(CONFIG_KEYS.pinHash);
}

export function getTheme(repo: LedgerRepo): Theme {
  return repo.getConfig(CONFIG_KEYS.theme) === 'dark' ? 'dark' : 'light';
}

export function saveTheme(repo: LedgerRepo, theme: Theme): boolean {
  return repo.setConfig(CONFIG_KEYS.theme, theme);
}

export function isFirstRun(repo: LedgerRepo): boolean {
  return repo.getConfig(CONFIG_KEYS.onboardingDone) !== '1';
}

export function completeOnboarding(repo: LedgerRepo): boolean {
  return repo.setConfig(CONFIG_KEYS.onboardingDone, '1');
}
