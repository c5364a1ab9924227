import { createConfig, type SddRouterConfig } from './config.js';
import { loadDepartmentCatalog, loadDomainCatalog } from './core/routing/catalog-loader-node.js';
import { DepartmentClassifier } from './core/routing/department-classifier.js';
import { DomainRouter } from './core/routing/domain-router.js';

export interface RouterServices {
    config: SddRouterConfig;
    router: DomainRouter;
    classifier: DepartmentClassifier;
}

export function createServices(config: SddRouterConfig = createConfig()): RouterServices {
    return {
        config,
        router: new DomainRouter(loadDomainCatalog(config.domainCatalogPath), {
            significantScore: config.significantScore,
            maxSpecialists: config.maxSpecialists,
        }),
        classifier: new DepartmentClassifier(loadDepartmentCatalog()),
    };
}
