import { BoroughConfig } from '../types/planning';

/**
 * Environmental monitoring terms screened for in application text
 */
export const MONITORING_KEYWORDS: string[] = [
  'remote monitoring',
  'noise monitoring',
  'vibration monitoring',
  'dust monitoring',
  'subsidence monitoring'
];

export const BOROUGH_CONFIGS: BoroughConfig[] = [
  {
    name: 'Camden',
    baseUrl: 'https://camdenpas.camden.gov.uk',
    searchUrl: 'https://camdenpas.camden.gov.uk/online-applications/search.do?action=simple&searchType=Application',
    portalFamily: 'tabular'
  },
  {
    name: 'Westminster',
    baseUrl: 'https://idoxpa.westminster.gov.uk',
    searchUrl: 'https://idoxpa.westminster.gov.uk/online-applications/search.do?action=simple&searchType=Application',
    portalFamily: 'result_card'
  },
  {
    name: 'Hammersmith & Fulham',
    baseUrl: 'https://public-access.lbhf.gov.uk',
    searchUrl: 'https://public-access.lbhf.gov.uk/online-applications/search.do?action=simple&searchType=Application',
    portalFamily: 'tabular'
  },
  {
    name: 'Tower Hamlets',
    baseUrl: 'https://development.towerhamlets.gov.uk',
    searchUrl: 'https://development.towerhamlets.gov.uk/online-applications/search.do?action=simple&searchType=Application',
    portalFamily: 'tabular'
  },
  {
    name: 'Southwark',
    baseUrl: 'https://planning.southwark.gov.uk',
    searchUrl: 'https://planning.southwark.gov.uk/online-applications/search.do?action=simple&searchType=Application',
    portalFamily: 'tabular'
  }
];

export function findBoroughConfig(name: string, boroughs: BoroughConfig[] = BOROUGH_CONFIGS): BoroughConfig | undefined {
  const wanted = name.trim().toLowerCase();
  return boroughs.find(borough => borough.name.toLowerCase() === wanted);
}
