export type ReadingLevel = 1 | 2 | 3 | 4 | 5;

export const READING_LEVELS: Readonly<Record<ReadingLevel, string>> = Object.freeze({
  1: '5th grade',
  2: '7th grade',
  3: '9th grade',
  4: '11th grade',
  5: 'College level',
});

export const DEFAULT_READING_LEVEL: ReadingLevel = 3;

export const SPECIALTIES = Object.freeze([
  'General Practitioner',
  'Cardiologist',
  'Neurologist',
  'Other',
] as const);

export type Specialty = (typeof SPECIALTIES)[number];

export const DEFAULT_SPECIALTY: Specialty = 'General Practitioner';

export const SUMMARY = Object.freeze({
  filename: 'medical_summary.pdf',
  mimeType: 'application/pdf',
  title: 'Your Medical Visit Summary',
  disclaimer:
    'Disclaimer: This document is not medical advice. Always consult a healthcare professional.',
});

export const UPLOAD = Object.freeze({
  maxFileSize: 10 * 1024 * 1024,
  fieldName: 'file',
});

export const isReadingLevel = (value: unknown): value is ReadingLevel =>
  typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 5;

export const isSpecialty = (value: unknown): value is Specialty =>
  typeof value === 'string' && SPECIALTIES.some((specialty) => specialty === value);
