import { Host } from '../models/repo.model';
import { cloneUrl, cloneUrlTemplate, hasCloneUrlTemplate } from './clone-url.builder';

describe('cloneUrl', () => {
    it('renders public and private GitHub URLs', () => {
        expect(cloneUrl(Host.GitHub, 'octocat', 'hello-world', false)).toBe('git://github.com/octocat/hello-world.git');
        expect(cloneUrl(Host.GitHub, 'octocat', 'hello-world', true)).toBe('git@github.com:octocat/hello-world.git');
    });

    it('renders public and private Bitbucket URLs', () => {
        expect(cloneUrl(Host.Bitbucket, 'acme', 'widgets', false)).toBe('https://bitbucket.org/acme/widgets.git');
        expect(cloneUrl(Host.Bitbucket, 'acme', 'widgets', true)).toBe('git@bitbucket.org:acme/widgets.git');
    });

    it('substitutes owner before name', () => {
        expect(cloneUrl(Host.GitHub, 'b', 'a', true)).toBe('git@github.com:b/a.git');
    });

    it('does not interpret format characters in the arguments', () => {
        expect(cloneUrl(Host.GitHub, '%s', '%d', false)).toBe('git://github.com/%s/%d.git');
    });

    it('is stable across calls', () => {
        expect(cloneUrl(Host.Bitbucket, 'acme', 'widgets', true)).toBe(cloneUrl(Host.Bitbucket, 'acme', 'widgets', true));
    });
});

describe('cloneUrlTemplate', () => {
    it('exposes the raw template for a host and visibility', () => {
        expect(cloneUrlTemplate(Host.GitHub, false)).toBe('git://github.com/%s/%s.git');
        expect(cloneUrlTemplate(Host.Bitbucket, true)).toBe('git@bitbucket.org:%s/%s.git');
    });
});

describe('hasCloneUrlTemplate', () => {
    it('knows only the hosted providers', () => {
        expect(hasCloneUrlTemplate(Host.GitHub)).toBe(true);
        expect(hasCloneUrlTemplate(Host.Bitbucket)).toBe(true);
        expect(hasCloneUrlTemplate(Host.GoogleCode)).toBe(false);
        expect(hasCloneUrlTemplate(Host.Custom)).toBe(false);
    });
});
