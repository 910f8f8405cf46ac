export const SUPPORTED_LOCALES = [
    'en_US', 'en_GB', 'fr_FR', 'de_DE', 'es_ES',
    'it_IT', 'pt_BR', 'ar_SA', 'ja_JP', 'zh_CN',
    'ru_RU', 'nl_NL', 'pl_PL', 'tr_TR', 'ar_TN'
] as const;

export type SupportedLocale = typeof SUPPORTED_LOCALES[number];

export function isSupportedLocale(value: string): value is SupportedLocale {
    return (SUPPORTED_LOCALES as readonly string[]).includes(value);
}

export type Gender = 'male' | 'female';

export interface IdentityRequest {
    includeFinancial?: boolean;
    includeProfessional?: boolean;
    minAge?: number;
    maxAge?: number;
    gender?: Gender;
}

export interface Identity {
    readonly fullName: string;
    readonly firstName: string;
    readonly lastName: string;
    readonly username: string;
    readonly email: string;
    readonly phone: string;
    readonly address: string;
    readonly city: string;
    readonly country: string;
    readonly postalCode: string;
    /** YYYY-MM-DD */
    readonly birthdate: string;
    readonly age: number;
    readonly gender: Gender;
    readonly nationalId: string;
    readonly passportNumber: string;
    readonly driverLicense: string;

    // null unless financial details were requested
    readonly creditCard: string | null;
    /** MM/YY */
    readonly creditCardExpiry: string | null;
    readonly creditCardCvv: string | null;
    readonly bankAccount: string | null;

    // null unless professional details were requested
    readonly company: string | null;
    readonly jobTitle: string | null;
    readonly website: string | null;

    readonly profilePicUrl: string;
    readonly locale: SupportedLocale;
}

export interface IdentityJSON {
    full_name: string;
    first_name: string;
    last_name: string;
    username: string;
    email: string;
    phone: string;
    address: string;
    city: string;
    country: string;
    postal_code: string;
    birthdate: string;
    age: number;
    gender: Gender;
    national_id: string;
    passport_number: string;
    driver_license: string;
    credit_card: string | null;
    credit_card_expiry: string | null;
    credit_card_cvv: string | null;
    bank_account: string | null;
    company: string | null;
    job_title: string | null;
    website: string | null;
    profile_pic_url: string;
    locale: SupportedLocale;
}
