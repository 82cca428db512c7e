import { BadRequestException } from '@nestjs/common';
import { buildCompanyCandidate } from './company-candidate';

function errorsOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    if (error instanceof BadRequestException) {
      return error.getResponse();
    }
    throw error;
  }
  throw new Error('expected BadRequestException');
}

describe('buildCompanyCandidate', () => {
  it('trims the name and upper-cases the alias', () => {
    expect(buildCompanyCandidate({ name: ' Acme ', roleAlias: ' acme' })).toEqual(
      { name: 'Acme', roleAlias: 'ACME' },
    );
  });

  it('rejects an alias starting with a digit', () => {
    expect(
      errorsOf(() => buildCompanyCandidate({ name: 'Acme', roleAlias: '1ACME' })),
    ).toEqual({
      status: 400,
      errors: { roleAlias: 'invalidRoleAlias' },
    });
  });

  it('rejects a one-letter alias', () => {
    expect(
      errorsOf(() => buildCompanyCandidate({ name: 'Acme', roleAlias: 'a' })),
    ).toEqual({
      status: 400,
      errors: {
        roleAlias: 'roleAlias must be longer than or equal to 2 characters',
      },
    });
  });

  it('rejects a blank name', () => {
    expect(
      errorsOf(() => buildCompanyCandidate({ name: '   ', roleAlias: 'ACME' })),
    ).toEqual({
      status: 400,
      errors: { name: 'name should not be empty' },
    });
  });
});
