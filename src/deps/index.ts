export {
  FileDependencyMaterializer,
  DependencyError,
  type IDependencyMaterializer,
  type ResolutionContext,
} from './dependency-materializer';
