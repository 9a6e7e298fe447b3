/**
 * scopeline - Pipeline Module
 *
 * Middleware pipeline utilities and composition
 */

export { PipelineBuilder, createPipeline, compose, branch } from './builder';
