import { ValidationError } from '@competency-search/common';

import { capitalize, compactCompetency, splitList, uniqueSorted } from '../mappers/contract';
import { createEscoMapper, splitEscoAppellation } from '../mappers/esco';
import { FORMACODE_URL, createFormaMapper } from '../mappers/forma';
import { FORMACODE14_URL, createFormaV14Mapper, stripCodePrefix, stripCodeSuffix } from '../mappers/forma14';
import { createMapperRegistry, resolveMapper } from '../mappers/registry';
import { createRomeMapper, splitRomeAppellation } from '../mappers/rome';
import { escoRecord } from './fixtures';

describe('mapper helpers', () => {
  it('capitalizes the first character only', () => {
    expect(capitalize('hEAD COOK')).toBe('Head cook');
    expect(capitalize('électronique')).toBe('Électronique');
    expect(capitalize('')).toBe('');
  });

  it('deduplicates, drops blanks and sorts', () => {
    expect(uniqueSorted(['b', 'a', ' ', 'b'])).toEqual(['a', 'b']);
  });

  it('splits lists and trims parts', () => {
    expect(splitList(' a $b$ $', '$')).toEqual(['a', 'b']);
    expect(splitList(null, '$')).toEqual([]);
  });

  it('drops empty optional fields', () => {
    expect(
      compactCompetency({
        code: 'C',
        lang: 'fr',
        type: 'skill',
        provider: 'rome',
        title: 'T',
        url: '',
        category: '',
        description: '',
        keywords: [],
        indexed_text: 'T'
      })
    ).toEqual({ code: 'C', lang: 'fr', type: 'skill', provider: 'rome', title: 'T', indexed_text: 'T' });
  });
});

describe('ESCO mapper', () => {
  const context = { provider: 'esco', type: 'skill', lang: 'en' } as const;

  it('maps a record into a competency', () => {
    expect(createEscoMapper(escoRecord, context).toCompetency()).toEqual({
      code: 'http://data.europa.eu/esco/skill/0001',
      lang: 'en',
      type: 'skill',
      provider: 'esco',
      title: 'Manage musical staff',
      url: 'http://data.europa.eu/esco/skill/0001',
      category: 'Musical activities, Staff management',
      description: 'Assign and manage staff tasks.',
      keywords: ['Coordinate duties of musical staff', 'Manage staff of music'],
      indexed_text: 'Manage musical staff'
    });
  });

  it('adds both halves of a split title and pipe separated labels', () => {
    const result = createEscoMapper(
      { preferredLabel: 'Chef/Cheffe', description: '', conceptUri: 'urn:esco:2', altLabels: 'cook | head COOK', code: 'E-2' },
      context
    ).toCompetency();

    expect(result.code).toBe('E-2');
    expect(result.title).toBe('Chef/cheffe');
    expect(result.keywords).toEqual(['Chef', 'Cheffe', 'Cook', 'Head cook']);
    expect(result.description).toBeUndefined();
    expect(result.category).toBeUndefined();
  });

  it('splits appellations only on a single slash', () => {
    expect(splitEscoAppellation('A / B')).toEqual(['A', 'B']);
    expect(splitEscoAppellation('A/B/C')).toEqual(['A/B/C']);
    expect(splitEscoAppellation('Plain')).toEqual(['Plain']);
  });

  it('rejects records missing required columns', () => {
    const mapping = () => createEscoMapper({ preferredLabel: 'x', description: '' }, context);

    expect(mapping).toThrow(ValidationError);
    expect(mapping).toThrow('Record does not match the esco format.');
  });
});

describe('ROME mapper', () => {
  const context = { provider: 'rome', type: 'occupation', lang: 'fr' } as const;

  it('distributes shared words across appellation halves', () => {
    expect(splitRomeAppellation('Agent / Agente de cuisine')).toEqual(['Agent de cuisine', 'Agente de cuisine']);
    expect(splitRomeAppellation('Conducteur de bus / car')).toEqual(['Conducteur de bus', 'Conducteur de car']);
    expect(splitRomeAppellation('Serveur / Serveuse')).toEqual(['Serveur', 'Serveuse']);
    expect(splitRomeAppellation('Commis de cuisine')).toEqual(['Commis de cuisine']);
  });

  it('maps a record into a competency', () => {
    const record = {
      code: 'G1602',
      intitule: 'Personnel de cuisine',
      category: 'Hôtellerie',
      description: 'Prépare les plats.',
      keywords: ['Agent / Agente de cuisine', 'Commis de cuisine', 'Conducteur de bus / car']
    };

    expect(createRomeMapper(record, context).toCompetency()).toEqual({
      code: 'G1602',
      lang: 'fr',
      type: 'occupation',
      provider: 'rome',
      title: 'Personnel de cuisine',
      url: 'https://candidat.pole-emploi.fr/metierscope/fiche-metier/G1602',
      category: 'Hôtellerie',
      description: 'Prépare les plats.',
      keywords: ['Agent de cuisine', 'Agente de cuisine', 'Commis de cuisine', 'Conducteur de bus', 'Conducteur de car'],
      indexed_text: 'Personnel de cuisine'
    });
  });
});

describe('Formacode mapper', () => {
  it('strips codes and merges keyword lists', () => {
    const record = {
      code: 15081,
      title: 'ÉLECTRONIQUE',
      category: '31054 Électricité électronique',
      NSF: '255 Électricité, électronique',
      semantic_field: '320 ÉLECTRICITÉ',
      synonym: 'électronique industrielle$ ',
      synonym_job: null,
      specific_terms: '15093 électronique de puissance$15094 microélectronique',
      associated_terms: null,
      ROME: 'H1209 Intervention technique en électronique',
      explication_note: 'Étude des circuits',
      application_note: null
    };

    expect(createFormaMapper(record, { provider: 'forma', type: 'certification', lang: 'fr' }).toCompetency()).toEqual({
      code: '15081',
      lang: 'fr',
      type: 'certification',
      provider: 'forma',
      title: 'Électronique',
      url: `${FORMACODE_URL}15081`,
      category: 'Électricité électronique',
      description: 'Électricité, électronique. Étude des circuits',
      keywords: [
        'Intervention technique en électronique',
        'Microélectronique',
        'Électricité',
        'Électronique de puissance',
        'Électronique industrielle'
      ],
      indexed_text: 'Électronique'
    });
  });
});

describe('Formacode v14 mapper', () => {
  it('strips leading and trailing codes of the expected width', () => {
    expect(stripCodePrefix('320 ÉLECTRICITÉ', 3)).toBe('ÉLECTRICITÉ');
    expect(stripCodePrefix('32 ÉLECTRICITÉ', 3)).toBe('32 ÉLECTRICITÉ');
    expect(stripCodeSuffix('Génie électrique - 24012', 5)).toBe('Génie électrique');
    expect(stripCodeSuffix('Domotique - 1234', 5)).toBe('Domotique - 1234');
  });

  it('maps the French export columns', () => {
    const record = {
      'Code du Terme': 31054,
      'Descripteur en typo riche': 'Électricité électronique',
      'TG (Terme Générique)': 'Génie électrique - 24012',
      'Champ sémantique': '320 ÉLECTRICITÉ',
      Synonymes: 'électrotechnique###ÉLECTRICITÉ INDUSTRIELLE',
      'Synonymes métier': null,
      'TS (Termes Spécifiques)': 'électronique - 15081###Domotique - 1234',
      'TA (Termes Associés)': 'Automatisme - 31067$ ',
      'NE (Note d’Explication)': 'Ensemble des techniques.',
      'NA (Note d’Application)': 'Inclut la maintenance.'
    };

    expect(createFormaV14Mapper(record, { provider: 'forma14', type: 'skill', lang: 'fr' }).toCompetency()).toEqual({
      code: '31054',
      lang: 'fr',
      type: 'skill',
      provider: 'forma14',
      title: 'Électricité électronique',
      url: `${FORMACODE14_URL}31054;tab=props;`,
      category: 'Génie électrique',
      description: 'Ensemble des techniques. Inclut la maintenance.',
      keywords: [
        'Automatisme',
        'Domotique - 1234',
        'Électricité',
        'Électricité industrielle',
        'Électrotechnique',
        'électronique'
      ],
      indexed_text: 'Électricité électronique'
    });
  });
});

describe('mapper registry', () => {
  it('resolves a factory for every provider', () => {
    const registry = createMapperRegistry();

    expect(resolveMapper(registry, 'esco')).toBe(createEscoMapper);
    expect(resolveMapper(registry, 'forma14')).toBe(createFormaV14Mapper);
  });

  it('rejects providers without a mapper', () => {
    expect(() => resolveMapper(new Map(), 'rome')).toThrow("No mapper registered for provider 'rome'.");
  });
});
