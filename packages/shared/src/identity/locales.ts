import {
    ar,
    base,
    de,
    en,
    en_GB,
    en_US,
    es,
    fr,
    it,
    ja,
    nl,
    pl,
    pt_BR,
    ru,
    tr,
    zh_CN,
    type LocaleDefinition
} from '@faker-js/faker';
import type { SupportedLocale } from '../types/identity.interface.js';

// Faker merges a chain one entry deep, so ar's partial person.title hides en's
const arabic: LocaleDefinition = { ...ar, person: { ...ar.person, title: en.person?.title } };

/**
 * Faker locale chain per supported identity locale. English and the base
 * locale back-fill whatever a regional locale leaves undefined.
 */
export const FAKER_LOCALES: Readonly<Record<SupportedLocale, LocaleDefinition[]>> = {
    en_US: [en_US, en, base],
    en_GB: [en_GB, en, base],
    fr_FR: [fr, en, base],
    de_DE: [de, en, base],
    es_ES: [es, en, base],
    it_IT: [it, en, base],
    pt_BR: [pt_BR, en, base],
    ar_SA: [arabic, en, base],
    ja_JP: [ja, en, base],
    zh_CN: [zh_CN, en, base],
    ru_RU: [ru, en, base],
    nl_NL: [nl, en, base],
    pl_PL: [pl, en, base],
    tr_TR: [tr, en, base],
    ar_TN: [arabic, en, base]
};
