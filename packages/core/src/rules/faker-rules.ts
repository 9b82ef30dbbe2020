/**
 * Opt-in rules producing realistic strings with @faker-js/faker
 *
 * Each matching field draws one sequence value and seeds a private Faker
 * instance with it, so the same counter position always yields the same
 * string. Fields whose name contains "email" are left to the built-in email
 * rule.
 */

import { Faker, en } from '@faker-js/faker';
import { all, nameContains, nameMatches, not, ofKind } from './matchers';
import { defineRule, type GenerationRule } from './rule';

export interface FakerRulesOptions {
  /** Added to every sequence value before seeding (default: 0) */
  seed?: number;
}

type Draw = (faker: Faker) => string;

const PRESETS: ReadonlyArray<readonly [string, RegExp, Draw]> = [
  ['first-name', /first_?name|given_?name/i, (f) => f.person.firstName()],
  ['last-name', /(last|sur|family)_?name/i, (f) => f.person.lastName()],
  ['full-name', /^(full_?)?name$/i, (f) => f.person.fullName()],
  ['phone', /phone|mobile/i, (f) => f.phone.number()],
  ['city', /city/i, (f) => f.location.city()],
  ['street-address', /street|^address$/i, (f) => f.location.streetAddress()],
  ['company', /company|organi[sz]ation/i, (f) => f.company.name()],
  ['url', /url|website/i, (f) => f.internet.url()],
  ['uuid', /uuid|guid/i, (f) => f.string.uuid()],
];

export function fakerRules(options: FakerRulesOptions = {}): GenerationRule[] {
  const faker = new Faker({ locale: [en] });
  const offset = options.seed ?? 0;

  return PRESETS.map(([name, pattern, draw]) =>
    defineRule(
      all(
        ofKind('string'),
        not(nameContains('email')),
        nameMatches(pattern)
      ),
      (_field, context) => {
        faker.seed(offset + context.next());
        return draw(faker);
      },
      { name: `faker:${name}` }
    )
  );
}
