import { Generation } from '../types';

const TERM_V2 = /^[^\s/\\\p{Cc}.]{2,}$/u;
const TERM_V1 = /^[^\s/\\\p{Cc}]{2,}$/u;
const TAG = /^[^/\\\p{Cc}]{2,255}$/u;

/**
 * Terms name distributions, extensions and users. Legacy terms may contain dots.
 */
export function isTerm(value: string, generation: Generation = Generation.Current): boolean {
  return (generation === Generation.Legacy ? TERM_V1 : TERM_V2).test(value);
}

export function isTag(value: string): boolean {
  return TAG.test(value);
}
