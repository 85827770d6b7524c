import { matchesAny } from '../glob';
import { RuleDefinition } from './rule';

/**
 * Clean Architecture layering: a file's layer is chosen by path, and its
 * imports may only reach modules of layers it is allowed to depend on.
 */
export const layerDependency: RuleDefinition = {
  id: 'layer-dependency',
  description: 'Layers may only import modules of the layers they depend on',
  category: 'architecture',
  defaultSeverity: 'error',
  fixable: false,
  defaultOptions: {},
  check({ file, projectPath, layers, report }) {
    const layer = layers.find(candidate => matchesAny(projectPath, candidate.paths));
    if (!layer) {
      return;
    }

    for (const declaration of file.imports) {
      if (layer.forbidden_imports?.includes(declaration.module)) {
        report(declaration, `${layer.name} layer must not import ${declaration.module}`);
        continue;
      }
      const owner = layers.find(candidate => candidate.modules.includes(declaration.module));
      if (!owner || owner.name === layer.name || layer.may_depend_on.includes(owner.name)) {
        continue;
      }
      report(declaration, `${layer.name} layer must not depend on ${owner.name} (imports ${declaration.module})`);
    }
  }
};

export const architectureRules: RuleDefinition[] = [layerDependency];
