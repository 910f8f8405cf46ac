import { Faker } from '@faker-js/faker';
import { createRandomSource, type RandomSource } from '../random/random-source.js';
import { InvalidArgumentError, type ValidationIssue } from '../types/errors.js';
import {
    isSupportedLocale,
    type Gender,
    type Identity,
    type IdentityRequest,
    type SupportedLocale
} from '../types/identity.interface.js';
import logger from '../utils/logger.js';
import { assertBatchCount } from '../utils/validation.js';
import { FAKER_LOCALES } from './locales.js';

export interface IdentityGeneratorOptions {
    locale?: string;
    seed?: number;
    /** Takes precedence over `seed` */
    random?: RandomSource;
    /** Date ages and card expiries are computed against; defaults to the current time on every call */
    referenceDate?: Date;
}

interface NameParts {
    first: string;
    last: string;
    birthYear: number;
}

type NamePattern = (name: NameParts, random: RandomSource) => string;

const GENDERS: readonly Gender[] = ['male', 'female'];

const USERNAME_PATTERNS: readonly NamePattern[] = [
    ({ first, last }) => `${first}${last}`,
    ({ first, last }) => `${first}.${last}`,
    ({ first, last }) => `${first}_${last}`,
    ({ first }, random) => `${first}${random.nextInt(1, 999)}`,
    ({ first, last, birthYear }) => `${first.charAt(0)}${last}${String(birthYear).slice(-2)}`,
    ({ first, last }, random) => `${last}${first.charAt(0)}${random.nextInt(1, 99)}`
];

const EMAIL_PATTERNS: readonly NamePattern[] = [
    ({ first, last }) => `${first}.${last}`,
    ({ first, last }) => `${first}${last}`,
    ({ first, last }) => `${first.charAt(0)}${last}`,
    ({ first }, random) => `${first}${random.nextInt(1, 999)}`
];

export const EMAIL_DOMAINS: readonly string[] = [
    'gmail.com', 'yahoo.com', 'outlook.com', 'hotmail.com',
    'protonmail.com', 'icloud.com', 'mail.com', 'aol.com'
];

export const AVATAR_TEMPLATES: readonly string[] = [
    'https://api.multiavatar.com/{seed}.png',
    'https://avatars.dicebear.com/api/identicon/{seed}.svg',
    'https://robohash.org/{seed}?set=set4',
    'https://ui-avatars.com/api/?name={name}&background=random'
];

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_FAKER_SEED = 2147483646;
const MAX_AGE = 120;

export function calculateAge(birthdate: Date, on: Date): number {
    const age = on.getUTCFullYear() - birthdate.getUTCFullYear();
    const beforeBirthday = on.getUTCMonth() < birthdate.getUTCMonth()
        || (on.getUTCMonth() === birthdate.getUTCMonth() && on.getUTCDate() < birthdate.getUTCDate());
    return beforeBirthday ? age - 1 : age;
}

function daysInMonth(year: number, month: number): number {
    return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

function formatDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * Fake personal identities, localised through Faker and seeded from the
 * injected random source so a seeded run is reproducible.
 */
export class IdentityGenerator {
    readonly locale: SupportedLocale;
    readonly random: RandomSource;
    private readonly faker: Faker;
    private readonly referenceDate?: Date;

    constructor(options: IdentityGeneratorOptions = {}) {
        const requested = options.locale ?? 'en_US';
        if (isSupportedLocale(requested)) {
            this.locale = requested;
        } else {
            logger.warn({ locale: requested }, 'Unsupported identity locale, falling back to en_US');
            this.locale = 'en_US';
        }
        this.random = options.random ?? createRandomSource(options.seed);
        this.faker = new Faker({ locale: FAKER_LOCALES[this.locale] });
        this.referenceDate = options.referenceDate;
    }

    generate(request: IdentityRequest = {}): Identity {
        const { includeFinancial = true, includeProfessional = true, minAge = 18, maxAge = 65 } = request;
        this.assertAgeRange(minAge, maxAge);

        const now = this.referenceDate ?? new Date();
        this.faker.seed(this.random.nextInt(0, MAX_FAKER_SEED));

        const gender = request.gender ?? this.random.pick(GENDERS);
        const firstName = this.faker.person.firstName(gender);
        const lastName = this.faker.person.lastName();
        const fullName = `${firstName} ${lastName}`;

        const birthdate = this.birthdate(minAge, maxAge, now);
        const name: NameParts = {
            first: firstName.toLowerCase(),
            last: lastName.toLowerCase(),
            birthYear: birthdate.getUTCFullYear()
        };

        return Object.freeze({
            fullName,
            firstName,
            lastName,
            username: this.random.pick(USERNAME_PATTERNS)(name, this.random),
            email: `${this.random.pick(EMAIL_PATTERNS)(name, this.random)}@${this.random.pick(EMAIL_DOMAINS)}`,
            phone: this.faker.phone.number(),
            address: this.faker.location.streetAddress(),
            city: this.faker.location.city(),
            country: this.faker.location.country(),
            postalCode: this.faker.location.zipCode(),
            birthdate: formatDate(birthdate),
            age: calculateAge(birthdate, now),
            gender,
            nationalId: this.faker.helpers.replaceSymbols('###-##-####'),
            passportNumber: `${this.faker.string.alpha({ length: 2, casing: 'upper' })}${this.faker.string.numeric(7)}`,
            driverLicense: `${this.faker.string.alpha({ length: 1, casing: 'upper' })}${this.faker.string.numeric(12)}`,

            creditCard: includeFinancial ? this.faker.finance.creditCardNumber() : null,
            creditCardExpiry: includeFinancial ? this.cardExpiry(now) : null,
            creditCardCvv: includeFinancial ? String(this.random.nextInt(100, 999)) : null,
            bankAccount: includeFinancial ? this.faker.string.numeric(16) : null,

            company: includeProfessional ? this.faker.company.name() : null,
            jobTitle: includeProfessional ? this.faker.person.jobTitle() : null,
            website: includeProfessional ? `https://${this.faker.internet.domainName()}` : null,

            profilePicUrl: this.avatarUrl(fullName),
            locale: this.locale
        });
    }

    generateBatch(count: number, request: IdentityRequest = {}): Identity[] {
        assertBatchCount(count);
        return Array.from({ length: count }, () => this.generate(request));
    }

    /**
     * Uniform calendar day among those that make the person exactly `age`
     * years old on `now`, for an age drawn from [minAge, maxAge].
     */
    private birthdate(minAge: number, maxAge: number, now: Date): Date {
        const age = this.random.nextInt(minAge, maxAge);
        const year = now.getUTCFullYear();
        const month = now.getUTCMonth();
        const day = now.getUTCDate();

        const latest = Date.UTC(year - age, month, Math.min(day, daysInMonth(year - age, month)));
        const earliest = Date.UTC(year - age - 1, month, Math.min(day, daysInMonth(year - age - 1, month))) + DAY_MS;
        const span = Math.round((latest - earliest) / DAY_MS);
        return new Date(earliest + this.random.nextInt(0, span) * DAY_MS);
    }

    private cardExpiry(now: Date): string {
        const monthsAhead = this.random.nextInt(1, 60);
        const expiry = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + monthsAhead, 1));
        const month = String(expiry.getUTCMonth() + 1).padStart(2, '0');
        const year = String(expiry.getUTCFullYear()).slice(-2);
        return `${month}/${year}`;
    }

    private avatarUrl(fullName: string): string {
        const template = this.random.pick(AVATAR_TEMPLATES);
        return template
            .replace('{seed}', String(this.random.nextInt(100000, 999999)))
            .replace('{name}', fullName.split(' ').join('+'));
    }

    private assertAgeRange(minAge: number, maxAge: number): void {
        const issues: ValidationIssue[] = [];
        if (!Number.isInteger(minAge) || minAge < 0 || minAge > MAX_AGE) {
            issues.push({ field: 'minAge', message: `Expected an integer between 0 and ${MAX_AGE}, received ${minAge}` });
        }
        if (!Number.isInteger(maxAge) || maxAge < 0 || maxAge > MAX_AGE) {
            issues.push({ field: 'maxAge', message: `Expected an integer between 0 and ${MAX_AGE}, received ${maxAge}` });
        }
        if (issues.length === 0 && minAge > maxAge) {
            issues.push({ field: 'minAge', message: `minAge (${minAge}) must not exceed maxAge (${maxAge})` });
        }
        if (issues.length > 0) {
            throw new InvalidArgumentError('Invalid identity age range', issues);
        }
    }
}

export function createIdentityGenerator(options: IdentityGeneratorOptions = {}): IdentityGenerator {
    return new IdentityGenerator(options);
}
