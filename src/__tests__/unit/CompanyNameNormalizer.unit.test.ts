/**
 * Unit Tests — Company Name Normalizer
 *
 * The normalized form is the key for the cache, the queue and fallback-ID
 * hashing, so these tests pin exact outputs rather than general shapes.
 */
import { isEmptyName, normalizeCompanyName } from '@domain/services/CompanyNameNormalizer';
import { EMPTY_NAME_SENTINEL } from '@shared/constants';

describe('normalizeCompanyName', () => {
  it('should map spacing, case and status variants of one company to the same value', () => {
    const variants = ['  ABC集团  ', 'abc集团', 'ABC集团(已终止)'];

    expect(variants.map(normalizeCompanyName)).toEqual(['abc集团', 'abc集团', 'abc集团']);
  });

  it('should remove full-width spaces', () => {
    expect(normalizeCompanyName('ABC　公司')).toBe('abc公司');
  });

  it('should fold full-width letters and brackets to half-width', () => {
    expect(normalizeCompanyName('ＡＢＣ（集团）有限公司')).toBe('abc(集团)有限公司');
    expect(normalizeCompanyName('ABC(集团)有限公司')).toBe('abc(集团)有限公司');
  });

  describe('status markers', () => {
    it('should remove a leading marker followed by a separator', () => {
      expect(normalizeCompanyName('已转出-ABC公司')).toBe('abc公司');
    });

    it('should remove a trailing marker after a separator', () => {
      expect(normalizeCompanyName('ABC公司-注销')).toBe('abc公司');
    });

    it('should remove a bracketed trailing marker in either bracket width', () => {
      expect(normalizeCompanyName('ABC公司（已终止）')).toBe('abc公司');
      expect(normalizeCompanyName('ABC公司(已终止)')).toBe('abc公司');
    });

    it('should remove a bracketed leading annotation', () => {
      expect(normalizeCompanyName('(原)ABC公司')).toBe('abc公司');
    });

    it('should keep a marker that is part of the name itself', () => {
      expect(normalizeCompanyName('转移科技有限公司')).toBe('转移科技有限公司');
    });
  });

  describe('suffixes and brackets', () => {
    it('should remove group-scope suffixes', () => {
      expect(normalizeCompanyName('ABC集团及下属子企业')).toBe('abc集团');
      expect(normalizeCompanyName('ABC公司-养老')).toBe('abc公司');
    });

    it('should drop a trailing bracketed region', () => {
      expect(normalizeCompanyName('ABC公司（北京）')).toBe('abc公司');
    });

    it('should keep a trailing bracket that states the legal form', () => {
      expect(normalizeCompanyName('ABC投资中心（有限合伙）')).toBe('abc投资中心(有限合伙)');
    });

    it('should remove decorative quotes', () => {
      expect(normalizeCompanyName('“ABC”公司')).toBe('abc公司');
    });
  });

  describe('trailing punctuation', () => {
    it('should strip trailing punctuation of either width', () => {
      expect(normalizeCompanyName('ABC公司。')).toBe('abc公司');
      expect(normalizeCompanyName('ABC公司...')).toBe('abc公司');
    });

    it('should strip empty brackets left at the end', () => {
      expect(normalizeCompanyName('ABC公司()')).toBe('abc公司');
    });

    it('should keep inner punctuation', () => {
      expect(normalizeCompanyName('ABC Co., Ltd.')).toBe('abcco.,ltd');
    });
  });

  describe('empty and placeholder input', () => {
    it.each([[''], ['   '], ['N/A'], ['null'], ['NULL'], ['  -  '], ['空白']])(
      'should map %j to the empty sentinel',
      (raw) => {
        expect(normalizeCompanyName(raw)).toBe(EMPTY_NAME_SENTINEL);
      },
    );

    it('should map null and undefined to the empty sentinel', () => {
      expect(normalizeCompanyName(null)).toBe(EMPTY_NAME_SENTINEL);
      expect(normalizeCompanyName(undefined)).toBe(EMPTY_NAME_SENTINEL);
    });

    it('should map input that cleans down to nothing to the empty sentinel', () => {
      expect(normalizeCompanyName('。。。')).toBe(EMPTY_NAME_SENTINEL);
    });

    it('should recognise the sentinel', () => {
      expect(isEmptyName(EMPTY_NAME_SENTINEL)).toBe(true);
      expect(isEmptyName('abc公司')).toBe(false);
    });
  });

  it('should leave protected names alone apart from spacing', () => {
    expect(normalizeCompanyName(' 保留 账户管理 ')).toBe('保留账户管理');
  });

  it('should be idempotent', () => {
    const inputs = [
      '  ABC集团  ',
      'ABC集团(已终止)',
      'ＡＢＣ（集团）有限公司',
      'ABC公司-注销.',
      '已转出-(原)ABC公司',
      'ABC投资中心（有限合伙）',
      'NULL.',
      '',
      EMPTY_NAME_SENTINEL,
      '保留账户管理',
    ];

    for (const input of inputs) {
      const once = normalizeCompanyName(input);
      expect(normalizeCompanyName(once)).toBe(once);
    }
  });

  it('should expose a marker uncovered by trailing punctuation', () => {
    expect(normalizeCompanyName('ABC公司-注销.')).toBe('abc公司');
  });

  it('should keep different companies apart', () => {
    expect(normalizeCompanyName('ABC公司')).not.toBe(normalizeCompanyName('ABD公司'));
  });
});
