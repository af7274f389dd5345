import { Customer } from '../types/transaction';
import { StructuralValidation } from '../types/sar';
import { logger } from '../config/logger';

const MIN_WORDS = 100;
const GENERIC_PHRASES = ['I cannot', "I'm sorry", 'As an AI'];
const REQUIRED_SECTIONS = ['activity', 'transaction', 'suspicious'];
const MIN_SECTIONS = 2;

/**
 * Structural checks on a generated narrative. Findings are advisory: they are
 * recorded for the reviewing analyst and never stop a report from being saved.
 */
export class NarrativeValidator {
    validate(narrative: string, customer: Pick<Customer, 'name' | 'accountNumber'>): StructuralValidation {
        const errors: string[] = [];
        const warnings: string[] = [];
        const lowered = narrative.toLowerCase();

        if (customer.name && !narrative.includes(customer.name)) {
            warnings.push(`Customer name '${customer.name}' not found in narrative`);
        }

        if (customer.accountNumber && !narrative.includes(customer.accountNumber)) {
            warnings.push('Customer account number not referenced in narrative');
        }

        const wordCount = narrative.split(/\s+/).filter(word => word.length > 0).length;
        if (wordCount < MIN_WORDS) {
            errors.push(`Narrative too short (${wordCount} words, minimum ${MIN_WORDS})`);
        }

        for (const phrase of GENERIC_PHRASES) {
            if (lowered.includes(phrase.toLowerCase())) {
                errors.push(`Narrative contains generic AI response: '${phrase}'`);
            }
        }

        const sectionsFound = REQUIRED_SECTIONS.filter(section => lowered.includes(section)).length;
        if (sectionsFound < MIN_SECTIONS) {
            warnings.push('Narrative may be missing key SAR sections');
        }

        const valid = errors.length === 0;

        if (valid) {
            logger.info('Narrative validation passed', { wordCount });
        } else {
            logger.warn('Narrative validation failed', { errors });
        }

        return { valid, errors, warnings, wordCount, sectionsFound };
    }
}
