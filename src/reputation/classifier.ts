import { parseAddress, type IpAddress } from './network.js';
import type { ReputationStore } from './store.js';
import type { Verdict } from './verdict.js';

export type Classifier = {
  classify: (addr: IpAddress) => Verdict;
  // null when the text is not an address literal.
  classifyText: (text: string) => Verdict | null;
};

export function createClassifier(store: ReputationStore): Classifier {
  return {
    classify: (addr) => store.classify(addr),
    classifyText: (text) => {
      const addr = parseAddress(text);
      return addr ? store.classify(addr) : null;
    }
  };
}
