import { describe, it, expect } from 'vitest';
import { formatNotification, formatSubject, formatTimestamp } from './notification.js';
import type { ListingRecord } from '../types/index.js';

const SEPARATOR = '─'.repeat(50);

const CONTEXT = {
  subjectPrefix: '美甲招聘',
  noun: '美甲 job listings',
  searchTerms: ['美甲', '指甲', 'nail', '小工'],
};

const RECORDS: ListingRecord[] = [
  {
    title: '长岛指甲店请大工',
    link: 'https://c.dadi360.com/c/posts/list/1003.page',
    author: '李姐',
    date: '2024-03-07',
    description: '电话：555-0100',
    domain: 'nail',
  },
  {
    title: '布鲁克林指甲学徒',
    link: 'https://c.dadi360.com/c/posts/list/1005.page',
    author: 'anon',
    date: '',
    description: '',
    domain: 'nail',
  },
];

describe('formatSubject', () => {
  it('should embed at most three terms', () => {
    expect(formatSubject('美甲招聘', ['美甲', '指甲', 'nail', '小工'])).toBe('【美甲招聘】New listings: 美甲、指甲、nail');
  });

  it('should embed fewer terms when fewer are configured', () => {
    expect(formatSubject('租房信息', ['出租'])).toBe('【租房信息】New listings: 出租');
  });
});

describe('formatTimestamp', () => {
  it('should format local time with padding', () => {
    expect(formatTimestamp(new Date(2024, 2, 8, 9, 5, 3))).toBe('2024-03-08 09:05:03');
  });
});

describe('formatNotification', () => {
  it('should render the summary followed by one block per record', () => {
    const message = formatNotification(RECORDS, CONTEXT, new Date(2024, 2, 8, 9, 5, 3));

    expect(message.subject).toBe('【美甲招聘】New listings: 美甲、指甲、nail');
    expect(message.body).toBe(
      [
        'Hello!',
        '',
        'The following new 美甲 job listings were found (keywords: 美甲, 指甲, nail, 小工):',
        '',
        '📊 Found 2 new 美甲 job listings',
        '',
        '📅 By date:',
        '  - 2024-03-07: 1',
        '  - unknown date: 1',
        '',
        '🔍 By keyword:',
        '  - 指甲: 2',
        '',
        '1. 📅 Date: 2024-03-07',
        '   📝 Title: 长岛指甲店请大工',
        '   👤 Author: 李姐',
        '   🔗 Link: https://c.dadi360.com/c/posts/list/1003.page',
        '   📄 Details: 电话：555-0100',
        `   ${SEPARATOR}`,
        '2. 📅 Date: ',
        '   📝 Title: 布鲁克林指甲学徒',
        '   👤 Author: anon',
        '   🔗 Link: https://c.dadi360.com/c/posts/list/1005.page',
        `   ${SEPARATOR}`,
        '',
        'Please check soon!',
        '',
        'Sent at: 2024-03-08 09:05:03',
      ].join('\n')
    );
  });

  it('should keep records in the order given', () => {
    const message = formatNotification([...RECORDS].reverse(), CONTEXT, new Date(2024, 0, 1));

    expect(message.body.indexOf('1. 📅 Date: \n')).toBeGreaterThan(-1);
    expect(message.body.indexOf('2. 📅 Date: 2024-03-07')).toBeGreaterThan(-1);
  });
});
