import { describe, it, expect } from 'vitest';
import { buildArtifactFileName, companyKey, headerSlug, markerKey, sanitizeFolderName } from '../naming-utils';

describe('companyKey', () => {
  it('ignores case and surrounding or repeated spaces', () => {
    expect(companyKey('Acme')).toBe('acme');
    expect(companyKey('acme ')).toBe('acme');
    expect(companyKey('ACME')).toBe('acme');
    expect(companyKey('  ACME   Corp ')).toBe('acme corp');
  });
});

describe('sanitizeFolderName', () => {
  it('drops characters outside letters, digits, space, dash and underscore', () => {
    expect(sanitizeFolderName('Acme S.A.')).toBe('Acme SA');
    expect(sanitizeFolderName('Ñandú & Co.')).toBe('Ñandú Co');
    expect(sanitizeFolderName('Foo/Bar:Baz')).toBe('FooBarBaz');
  });

  it('keeps dashes and underscores', () => {
    expect(sanitizeFolderName('Tech-Lab_2')).toBe('Tech-Lab_2');
  });

  it('trims the result', () => {
    expect(sanitizeFolderName('  Acme  ')).toBe('Acme');
  });

  it('falls back to a placeholder when nothing is left', () => {
    expect(sanitizeFolderName('')).toBe('Sin_Empresa');
    expect(sanitizeFolderName('***')).toBe('Sin_Empresa');
  });
});

describe('headerSlug', () => {
  it('lower-cases and joins words with underscores', () => {
    expect(headerSlug(' Fecha de Emisión ')).toBe('fecha_de_emisión');
    expect(headerSlug('Nombre')).toBe('nombre');
  });
});

describe('markerKey', () => {
  it('folds accents after slugging', () => {
    expect(markerKey('Compañia')).toBe('compania');
    expect(markerKey('COMPANIA')).toBe('compania');
    expect(markerKey(' Fecha de Emisión ')).toBe('fecha_de_emision');
  });
});

describe('buildArtifactFileName', () => {
  it('builds a name from the row identity', () => {
    expect(buildArtifactFileName({ rowId: 3, name: 'José Pérez', nationalId: '1.234.567-8' })).toBe(
      'Certificado_Jose_Perez_12345678_3.pdf',
    );
  });

  it('gives the same name for the same row', () => {
    const row = { rowId: 0, name: 'Ana Gómez', nationalId: 'V-100' };
    expect(buildArtifactFileName(row)).toBe(buildArtifactFileName({ ...row }));
  });

  it('differs between rows sharing a name and id', () => {
    const a = buildArtifactFileName({ rowId: 1, name: 'Ana', nationalId: '7' });
    const b = buildArtifactFileName({ rowId: 2, name: 'Ana', nationalId: '7' });
    expect(a).not.toBe(b);
  });

  it('uses placeholders for empty values', () => {
    expect(buildArtifactFileName({ rowId: 0, name: '', nationalId: '' })).toBe('Certificado_SinNombre_SinID_0.pdf');
  });
});
