import { mapLead, normalizeReferringUrl, toInboxLeadRequest } from '../src/services/fieldMapper';
import { DEFAULT_FALLBACK_POLICY } from '../src/config';
import { ValidationError } from '../src/utils/appError';
import { FallbackPolicy, LEAD_FIELDS, PayloadShape } from '../src/types';

describe('Field Mapper', () => {
    it('should map a complete Direct record without fallbacks', () => {
        const record = {
            from_first: 'Jane',
            from_last: 'Doe',
            from_message: 'Please call',
            from_email: 'jane@example.com',
            from_phone: '555',
            referring_url: 'https://example.com',
            from_source: 'Web'
        };

        expect(mapLead(record, PayloadShape.DIRECT, DEFAULT_FALLBACK_POLICY)).toEqual({
            lead: {
                firstName: 'Jane',
                lastName: 'Doe',
                message: 'Please call',
                email: 'jane@example.com',
                phone: '555',
                referringUrl: 'https://example.com',
                source: 'Web'
            },
            appliedFallbacks: []
        });
    });

    it('should fill every missing field from the policy and record which ones', () => {
        const result = mapLead({ first_name: 'John', message: 'need help' }, PayloadShape.FLAT_LEGACY, DEFAULT_FALLBACK_POLICY);

        expect(result.lead).toEqual({
            firstName: 'John',
            lastName: 'Contact',
            message: 'need help',
            email: 'unknown@intake-system.local',
            phone: '0000000000',
            referringUrl: 'https://intake-system.local',
            source: 'Voice Agent Bot'
        });
        expect(result.appliedFallbacks).toEqual(['lastName', 'email', 'phone', 'referringUrl', 'source']);
    });

    it('should produce seven non-empty fields for an empty record', () => {
        const { lead, appliedFallbacks } = mapLead({}, PayloadShape.ENVELOPE_SINGLE, DEFAULT_FALLBACK_POLICY);

        for (const field of LEAD_FIELDS) {
            expect(lead[field].length).toBeGreaterThan(0);
        }
        expect(appliedFallbacks).toEqual([...LEAD_FIELDS]);
    });

    it('should coerce producer values: trim strings, stringify numbers, drop booleans and null', () => {
        const result = mapLead({
            first_name: '  Ana  ',
            last_name: '   ',
            phone_number: 5551234,
            message: false,
            referring_url: 'vonage',
            source: null,
            email: ['a@example.com']
        }, PayloadShape.ENVELOPE_SINGLE, DEFAULT_FALLBACK_POLICY);

        expect(result.lead).toEqual({
            firstName: 'Ana',
            lastName: 'Contact',
            message: 'Voice agent intake submission',
            email: 'unknown@intake-system.local',
            phone: '5551234',
            referringUrl: 'https://vonage.com/',
            source: 'Voice Agent Bot'
        });
        expect(result.appliedFallbacks).toEqual(['lastName', 'message', 'email', 'source']);
    });

    it('should read native names as secondary keys for Direct records', () => {
        const { lead } = mapLead(
            { from_first: 'Jane', first_name: 'Ignored', last_name: 'Doe', phone_number: '123' },
            PayloadShape.DIRECT,
            DEFAULT_FALLBACK_POLICY
        );

        expect(lead.firstName).toBe('Jane');
        expect(lead.lastName).toBe('Doe');
        expect(lead.phone).toBe('123');
    });

    it('should accept phone as a native alias of phone_number', () => {
        const { lead } = mapLead({ phone: '+1 555 0100' }, PayloadShape.FLAT_LEGACY, DEFAULT_FALLBACK_POLICY);

        expect(lead.phone).toBe('+1 555 0100');
    });

    it('should look up missing batch item fields on the envelope root before the policy', () => {
        const result = mapLead(
            { first_name: 'A', source: '' },
            PayloadShape.FLAT_LEGACY,
            DEFAULT_FALLBACK_POLICY,
            { source: 'Shared Source', referring_url: 'agent.example.com' }
        );

        expect(result.lead.source).toBe('Shared Source');
        expect(result.lead.referringUrl).toBe('https://agent.example.com');
        expect(result.appliedFallbacks).toEqual(['lastName', 'message', 'email', 'phone']);
    });

    it('should reject records that are not objects', () => {
        expect(() => mapLead('just text', PayloadShape.FLAT_LEGACY, DEFAULT_FALLBACK_POLICY)).toThrow(ValidationError);

        let caught: unknown;
        try {
            mapLead(null, PayloadShape.FLAT_LEGACY, DEFAULT_FALLBACK_POLICY);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ValidationError);
        expect(caught instanceof ValidationError ? caught.fields : null).toEqual(['record']);
    });

    it('should name fields an incomplete policy cannot satisfy', () => {
        const policy: FallbackPolicy = { ...DEFAULT_FALLBACK_POLICY, lastName: '', source: ' ' };

        expect(() => mapLead({ first_name: 'A' }, PayloadShape.FLAT_LEGACY, policy))
            .toThrow('Unsatisfiable lead fields: lastName, source');
    });

    describe('normalizeReferringUrl', () => {
        it.each([
            ['vonage', 'https://vonage.com/'],
            ['Vonage', 'https://vonage.com/'],
            ['https://example.com/contact', 'https://example.com/contact'],
            ['HTTP://example.com', 'HTTP://example.com'],
            ['example.com', 'https://example.com'],
            ['phone call', null],
            ['localhost', null]
        ])('should normalize %s', (input, expected) => {
            expect(normalizeReferringUrl(input)).toBe(expected);
        });
    });

    describe('toInboxLeadRequest', () => {
        it('should produce the exact lead-inbox body with the token', () => {
            const { lead } = mapLead({ first_name: 'John', message: 'need help' }, PayloadShape.FLAT_LEGACY, DEFAULT_FALLBACK_POLICY);

            expect(toInboxLeadRequest(lead, 'test-token')).toEqual({
                inbox_lead: {
                    from_first: 'John',
                    from_last: 'Contact',
                    from_message: 'need help',
                    from_email: 'unknown@intake-system.local',
                    from_phone: '0000000000',
                    referring_url: 'https://intake-system.local',
                    from_source: 'Voice Agent Bot'
                },
                inbox_lead_token: 'test-token'
            });
        });
    });
});
