import { PasshashError } from '../../shared/errors/errors';

export const ContextErrors = {
  noSchemes() {
    return PasshashError.invalidPolicy('A crypt context needs at least one scheme');
  },

  unknownScheme(scheme: string) {
    return PasshashError.unknownScheme(`Unknown scheme: ${scheme}`, { scheme });
  },

  schemeNotInContext(scheme: string) {
    return PasshashError.unknownScheme(`Scheme ${scheme} is not enabled in this context`, {
      scheme,
    });
  },

  unidentifiedHash() {
    return PasshashError.unknownScheme('Hash could not be identified by any configured scheme');
  },

  hashNotRecognized(scheme: string) {
    return PasshashError.invalidHash(`Hash is not a valid ${scheme} hash`, { scheme });
  },
} as const;
