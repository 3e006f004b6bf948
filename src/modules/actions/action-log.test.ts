import { describe, expect, it } from 'vitest';
import {
  classifyAction,
  extractEnactmentMarker,
  extractPrimarySponsor,
  parseActionDate,
  parseActionLog,
  splitNameList,
  trackCoSponsorTiers,
  type ActionEntry,
} from './action-log.js';

function entry(text: string, date: string | null = null, chamber: string | null = 'House'): ActionEntry {
  return { date, text, chamber };
}

describe('parseActionDate', () => {
  it('reads state and national date formats', () => {
    expect(parseActionDate('1/9/2023')).toBe(Date.UTC(2023, 0, 9));
    expect(parseActionDate('2025-03-14')).toBe(Date.UTC(2025, 2, 14));
    expect(parseActionDate('2025-03-14T10:00:00Z')).toBe(Date.UTC(2025, 2, 14));
  });

  it('rejects impossible and unknown dates', () => {
    expect(parseActionDate('2/30/2023')).toBeNull();
    expect(parseActionDate('yesterday')).toBeNull();
    expect(parseActionDate(null)).toBeNull();
  });
});

describe('extractEnactmentMarker', () => {
  it('reads the public act number from dotted leader text', () => {
    expect(extractEnactmentMarker('Public Act . . . . . . . . . 103-0324')).toBe('103-0324');
  });

  it('returns null when there is no marker', () => {
    expect(extractEnactmentMarker('Session Sine Die')).toBeNull();
    expect(extractEnactmentMarker(null)).toBeNull();
  });
});

describe('splitNameList', () => {
  it('splits on commas and "and", dropping titles', () => {
    expect(splitNameList('Reps. Amy Briel and Rick Ryan')).toEqual(['Amy Briel', 'Rick Ryan']);
    expect(splitNameList('Sen. Kim Park, Sen. Bo Diaz')).toEqual(['Kim Park', 'Bo Diaz']);
  });

  it('keeps suffix commas inside one name', () => {
    expect(splitNameList('Reps. Mike Coffey, Jr., Ann Lee and Tom Weber')).toEqual([
      'Mike Coffey Jr.',
      'Ann Lee',
      'Tom Weber',
    ]);
  });

  it('unwraps a fully parenthesized list', () => {
    expect(splitNameList('(Rep. Ann Lee)')).toEqual(['Ann Lee']);
  });

  it('is empty for empty input', () => {
    expect(splitNameList('')).toEqual([]);
    expect(splitNameList(undefined)).toEqual([]);
  });
});

describe('extractPrimarySponsor', () => {
  it('takes the earliest titled filer', () => {
    const actions = [
      entry('Filed with the Clerk by Rep. Ann Lee', '1/12/2023'),
      entry('Prefiled with Clerk by Rep. Tom Weber', '1/9/2023'),
    ];
    expect(extractPrimarySponsor(actions)).toBe('Tom Weber');
  });

  it('ignores filings without a legislator title', () => {
    expect(extractPrimarySponsor([entry('Filed by the Committee on Rules', '1/9/2023')])).toBeNull();
  });

  it('lets a sponsor change override the original filer', () => {
    const actions = [
      entry('Prefiled with Clerk by Rep. Ann Lee', '1/9/2023'),
      entry('Chief Sponsor Changed to Rep. Tom Weber', '2/1/2023'),
    ];
    expect(extractPrimarySponsor(actions)).toBe('Tom Weber');
  });

  it('takes the latest of several sponsor changes', () => {
    const actions = [
      entry('Filed with the Clerk by Rep. Ann Lee', '1/9/2023'),
      entry('Chief Sponsor Changed to Rep. Kim Park', '3/1/2023'),
      entry('Chief Sponsor Changed to Rep. Tom Weber', '2/1/2023'),
    ];
    expect(extractPrimarySponsor(actions)).toBe('Kim Park');
  });

  it('sorts undated filings after dated ones', () => {
    const actions = [
      entry('Filed with the Clerk by Rep. Ann Lee'),
      entry('Filed with the Clerk by Rep. Tom Weber', '5/1/2023'),
    ];
    expect(extractPrimarySponsor(actions)).toBe('Tom Weber');
  });
});

describe('classifyAction', () => {
  it('applies the fixed trigger priority', () => {
    expect(classifyAction('Added Chief Co-Sponsor Rep. Ann Lee')).toBe('add-chief');
    expect(classifyAction('Removed Chief Co-Sponsor Rep. Ann Lee')).toBe('remove-chief');
    expect(classifyAction('Added Co-Sponsor Rep. Ann Lee')).toBe('add-co');
    expect(classifyAction('Removed Co-Sponsor Rep. Ann Lee')).toBe('remove-co');
    expect(classifyAction('Referred to Rules Committee')).toBeNull();
  });

  it('resolves an entry matching two triggers under the first in priority', () => {
    // Both "Removed Co-Sponsor" and "Added Chief Co-Sponsor" appear
    const text = 'Removed Co-Sponsor Rep. Tom Weber; Added Chief Co-Sponsor Rep. Ann Lee';
    expect(classifyAction(text)).toBe('add-chief');

    const tiers = trackCoSponsorTiers([
      entry('Added Co-Sponsor Rep. Tom Weber'),
      entry(text),
    ]);
    expect(tiers.chiefCoSponsorNames).toEqual(['Ann Lee']);
    expect(tiers.coSponsorNames).toEqual(['Tom Weber']);
  });
});

describe('trackCoSponsorTiers', () => {
  it('promotes a plain co-sponsor to the chief tier', () => {
    const tiers = trackCoSponsorTiers([
      entry('Added Co-Sponsor Rep. Ann Lee'),
      entry('Added Chief Co-Sponsor Rep. Ann Lee'),
    ]);
    expect(tiers.chiefCoSponsorNames).toEqual(['Ann Lee']);
    expect(tiers.coSponsorNames).toEqual([]);
  });

  it('does not add a chief co-sponsor to the plain tier', () => {
    const tiers = trackCoSponsorTiers([
      entry('Added Chief Co-Sponsor Rep. Ann Lee'),
      entry('Added Co-Sponsor Rep. Ann Lee'),
    ]);
    expect(tiers.coSponsorNames).toEqual([]);
  });

  it('removes by normalized name regardless of title and suffix', () => {
    const tiers = trackCoSponsorTiers([
      entry('Added Co-Sponsor Rep. Mike Coffey, Jr.'),
      entry('Removed Co-Sponsor Representative Mike Coffey'),
      entry('Added Chief Co-Sponsor Sen. Kim Park'),
      entry('Removed Chief Co-Sponsor Kim Park'),
    ]);
    expect(tiers).toEqual({ chiefCoSponsorNames: [], coSponsorNames: [] });
  });

  it('treats repeated adds as one entry', () => {
    const tiers = trackCoSponsorTiers([
      entry('Added Co-Sponsors Reps. Ann Lee and Tom Weber'),
      entry('Added Co-Sponsor Rep. ann  lee'),
    ]);
    expect(tiers.coSponsorNames).toEqual(['Ann Lee', 'Tom Weber']);
  });

  it('ignores a trigger with no names after it', () => {
    const tiers = trackCoSponsorTiers([entry('Added Co-Sponsor'), entry('Removed Co-Sponsor')]);
    expect(tiers).toEqual({ chiefCoSponsorNames: [], coSponsorNames: [] });
  });

  it('removes only from the named tier', () => {
    const tiers = trackCoSponsorTiers([
      entry('Added Chief Co-Sponsor Rep. Ann Lee'),
      entry('Removed Co-Sponsor Rep. Ann Lee'),
    ]);
    expect(tiers.chiefCoSponsorNames).toEqual(['Ann Lee']);
  });
});

describe('parseActionLog', () => {
  it('combines the sponsor and both tiers', () => {
    const parsed = parseActionLog([
      entry('Prefiled with Clerk by Rep. Ann Lee', '1/9/2023'),
      entry('First Reading', '1/12/2023'),
      entry('Added Co-Sponsors Reps. Tom Weber, Kim Park', '2/2/2023'),
      entry('Added Chief Co-Sponsor Rep. Kim Park', '2/9/2023'),
      entry('Public Act . . . . . . . . . 103-0324', '8/4/2023'),
    ]);
    expect(parsed).toEqual({
      primarySponsorName: 'Ann Lee',
      chiefCoSponsorNames: ['Kim Park'],
      coSponsorNames: ['Tom Weber'],
    });
  });

  it('yields nothing from malformed entries', () => {
    expect(parseActionLog([entry(''), entry('   '), entry('??', 'not a date')])).toEqual({
      primarySponsorName: null,
      chiefCoSponsorNames: [],
      coSponsorNames: [],
    });
  });
});
