import { ValidationError } from '../../shared/errors.js';
import { isPlainObject } from '../../shared/storage/recordMetadata.js';
import { readOptionalString } from '../../shared/utils/readers.js';
import { roundTo } from '../../shared/utils/rounding.js';
import type { ContactInfo, ResumeWriteModel } from './resumes.types.js';

const DEFAULT_NAME = 'hh.ru candidate';
const DEFAULT_POSITION = 'Specialist';
const DEFAULT_EDUCATION = 'Not specified';

const readExperienceYears = (experience: unknown): number => {
  if (!isPlainObject(experience)) {
    return 0;
  }
  const total = experience.total;
  // hh.ru reports the total either as { months } or as a bare number of months
  const months = isPlainObject(total) ? total.months : total;
  if (typeof months !== 'number' || !Number.isInteger(months)) {
    return 0;
  }
  return Math.max(0, roundTo(months / 12));
};

const readSkills = (source: Record<string, unknown>): string[] => {
  const raw = Array.isArray(source.key_skills) && source.key_skills.length ? source.key_skills : source.skills;
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.flatMap((entry) => {
    if (isPlainObject(entry) && typeof entry.name === 'string') {
      return [entry.name];
    }
    return typeof entry === 'string' ? [entry] : [];
  });
};

const readEducation = (education: unknown): string => {
  if (isPlainObject(education) && isPlainObject(education.level) && typeof education.level.name === 'string') {
    return education.level.name;
  }
  return DEFAULT_EDUCATION;
};

const readLanguages = (source: Record<string, unknown>): string[] => {
  const raw = Array.isArray(source.language) && source.language.length ? source.language : source.languages;
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.flatMap((entry) => {
    if (!isPlainObject(entry)) {
      return [];
    }
    const name = readOptionalString(entry.name) ?? readOptionalString(entry.id);
    if (!name) {
      return [];
    }
    const level = isPlainObject(entry.level) ? readOptionalString(entry.level.name) : readOptionalString(entry.level);
    return [level ? `${name} (${level})` : name];
  });
};

const readPhone = (value: unknown): string | undefined => {
  if (isPlainObject(value)) {
    return readOptionalString(value.formatted) ?? readOptionalString(value.number);
  }
  return readOptionalString(value);
};

const readContactInfo = (source: Record<string, unknown>): ContactInfo => {
  const contact = isPlainObject(source.contact) ? source.contact : source.contacts;
  let email: string | undefined;
  let phone: string | undefined;

  if (isPlainObject(contact)) {
    email = readOptionalString(contact.email);
    phone = readPhone(contact.phone);
  }

  if (!email) {
    email = readOptionalString(source.email);
  }
  if (!phone && Array.isArray(source.phones) && source.phones.length) {
    phone = readPhone(source.phones[0]);
  }

  return { email: email ?? '', phone: phone ?? '' };
};

/**
 * Maps a résumé exported from hh.ru to the internal résumé shape. Missing sections fall back
 * to neutral defaults instead of failing the import.
 */
export const mapHhResume = (payload: unknown): ResumeWriteModel => {
  if (!isPlainObject(payload)) {
    throw new ValidationError('body', 'missing', 'Provide the hh.ru résumé JSON.');
  }

  const firstName = readOptionalString(payload.first_name) ?? readOptionalString(payload.name) ?? '';
  const lastName = readOptionalString(payload.last_name) ?? '';
  const title = readOptionalString(payload.title);

  return {
    name: `${firstName} ${lastName}`.trim() || title || DEFAULT_NAME,
    position: title ?? readOptionalString(payload.position) ?? DEFAULT_POSITION,
    experienceYears: readExperienceYears(payload.experience),
    skills: readSkills(payload),
    education: readEducation(payload.education),
    languages: readLanguages(payload),
    contactInfo: readContactInfo(payload)
  };
};
