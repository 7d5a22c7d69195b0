import { BoroughConfig } from '../../types/planning';
import { PortalAdapter } from './portalAdapter';
import { ResultCardAdapter } from './resultCardAdapter';
import { TabularAdapter } from './tabularAdapter';

export { BasePortalAdapter, PortalAdapter, SearchRequest } from './portalAdapter';
export { ResultCardAdapter } from './resultCardAdapter';
export { TabularAdapter } from './tabularAdapter';

export function createPortalAdapter(config: BoroughConfig): PortalAdapter {
  switch (config.portalFamily) {
    case 'tabular':
      return new TabularAdapter(config);
    case 'result_card':
      return new ResultCardAdapter(config);
    default: {
      const unknownFamily: never = config.portalFamily;
      throw new Error(`Unsupported portal family: ${String(unknownFamily)}`);
    }
  }
}
