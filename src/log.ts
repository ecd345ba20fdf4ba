import registerDebug from 'debug';

// Enable with DEBUG=slr-tables:*
export const debugGrammar = registerDebug('slr-tables:grammar');
export const debugSymbols = registerDebug('slr-tables:symbols');
export const debugAutomaton = registerDebug('slr-tables:automaton');
export const debugTable = registerDebug('slr-tables:table');
