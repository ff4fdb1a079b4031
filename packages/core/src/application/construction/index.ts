export {
  ContainerBuilder,
  buildContainer,
  type IContainerBuilderOptions,
  type IBuildContainerOptions,
} from './container-builder';
