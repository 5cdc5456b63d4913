import type { FieldAccessor } from './types.js';
import { sliceField } from './slice.js';
import { RISK_ARRAY } from '../types/index.js';
import { MalformedFieldError } from '../errors.js';
import { parseInteger } from '../utils/numeric.js';

const { CHUNK_WIDTH, MAGNITUDE_WIDTH, SCALE, NEGATIVE_FLAG } = RISK_ARRAY;

/**
 * Risk array: 6-character chunks of a zero-padded magnitude and a sign flag.
 * "00567-" is -0.0567, "01133+" is 0.1133. A bad magnitude is fatal.
 */
export const decodeRiskArray: FieldAccessor<'signed_magnitude_array'> = (line, spec) => {
    const text = sliceField(line, spec);
    const values: number[] = [];

    for (let index = 0; index < text.length; index += CHUNK_WIDTH) {
        const digits = text.slice(index, index + MAGNITUDE_WIDTH);
        const magnitude = parseInteger(digits);
        if (magnitude === null) {
            throw new MalformedFieldError(spec, text.slice(index, index + CHUNK_WIDTH), 'a signed magnitude');
        }
        values.push(magnitude * (text[index + MAGNITUDE_WIDTH] === NEGATIVE_FLAG ? -SCALE : SCALE));
    }

    return values;
};
