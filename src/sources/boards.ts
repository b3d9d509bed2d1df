import type { BoardLayout } from './html-board';

function slug(words: string[]): string {
  return words
    .slice(0, 2)
    .map(word => encodeURIComponent(word.toLowerCase()))
    .join('-');
}

export const INTERNSHALA: BoardLayout = {
  name: 'internshala',
  origin: 'https://internshala.com',
  searchUrl: words => `https://internshala.com/internships/keyword-${slug(words)}`,
  cardSelectors: ['div.internship_card', 'article.internship'],
  companySelectors: ['a.internship_company', 'span.company_name'],
  roleSelectors: ['h3.job_title', 'span.role_name'],
  locationSelectors: ['span.location', 'span.city'],
  defaultLocation: 'Not Specified',
};

export const WELLFOUND: BoardLayout = {
  name: 'wellfound',
  origin: 'https://wellfound.com',
  searchUrl: words =>
    `https://wellfound.com/jobs?keywords=${words.slice(0, 2).map(encodeURIComponent).join('+')}&job_type=internship`,
  cardSelectors: ['div.job-listing'],
  companySelectors: ['span.company-name'],
  roleSelectors: ['h2.job-title'],
  locationSelectors: ['span.location'],
  defaultLocation: 'Remote',
};

export const GLASSDOOR: BoardLayout = {
  name: 'glassdoor',
  origin: 'https://www.glassdoor.com',
  searchUrl: words => `https://www.glassdoor.com/Job/internship-${slug(words)}-jobs-SRCH_KO0,11.htm`,
  cardSelectors: ['div.job-search-result'],
  companySelectors: ['span.company-name'],
  roleSelectors: ['a.job-title'],
  locationSelectors: ['span.job-location'],
  defaultLocation: 'Not Specified',
};
