import { InvalidInputError } from '../../common/errors/app-errors.js';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe.js';
import {
  ListRecordsQuerySchema,
  MAX_RECORD_ID,
  RecordIdSchema,
} from './list-records.dto.js';

describe('record id bounds', () => {
  it('ids up to the int4 maximum pass', () => {
    const pipe = new ZodValidationPipe(RecordIdSchema);
    expect(pipe.transform('1')).toBe(1);
    expect(pipe.transform(String(MAX_RECORD_ID))).toBe(2147483647);
  });

  it('an id past int4 is INVALID_INPUT, not a database error', () => {
    const pipe = new ZodValidationPipe(RecordIdSchema);
    expect(() => pipe.transform('2147483648')).toThrow(InvalidInputError);
  });

  it('list cursor has the same bound', () => {
    const pipe = new ZodValidationPipe(ListRecordsQuerySchema);
    expect(pipe.transform({ after: '2147483647' })).toEqual({
      limit: 20,
      after: 2147483647,
    });
    expect(() => pipe.transform({ after: '2147483648' })).toThrow(
      InvalidInputError,
    );
    expect(() => pipe.transform({ after: '1e21' })).toThrow(InvalidInputError);
  });
});
