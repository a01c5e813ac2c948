export { SearchMatcher, matchItems } from './SearchMatcher';
