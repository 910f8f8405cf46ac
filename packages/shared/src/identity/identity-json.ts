import type { Identity, IdentityJSON } from '../types/identity.interface.js';

export function toIdentityJSON(identity: Identity): IdentityJSON {
    return {
        full_name: identity.fullName,
        first_name: identity.firstName,
        last_name: identity.lastName,
        username: identity.username,
        email: identity.email,
        phone: identity.phone,
        address: identity.address,
        city: identity.city,
        country: identity.country,
        postal_code: identity.postalCode,
        birthdate: identity.birthdate,
        age: identity.age,
        gender: identity.gender,
        national_id: identity.nationalId,
        passport_number: identity.passportNumber,
        driver_license: identity.driverLicense,
        credit_card: identity.creditCard,
        credit_card_expiry: identity.creditCardExpiry,
        credit_card_cvv: identity.creditCardCvv,
        bank_account: identity.bankAccount,
        company: identity.company,
        job_title: identity.jobTitle,
        website: identity.website,
        profile_pic_url: identity.profilePicUrl,
        locale: identity.locale
    };
}
