import { format } from 'util';
import { Host, Visibility } from '../models/repo.model';

export type TemplatedHost = Host.GitHub | Host.Bitbucket;

// Placeholders are owner, then name. Consumers parse these shapes.
const CLONE_URL_TEMPLATES: Record<TemplatedHost, Record<Visibility, string>> = {
    [Host.GitHub]: {
        [Visibility.Public]: 'git://github.com/%s/%s.git',
        [Visibility.Private]: 'git@github.com:%s/%s.git',
    },
    [Host.Bitbucket]: {
        [Visibility.Public]: 'https://bitbucket.org/%s/%s.git',
        [Visibility.Private]: 'git@bitbucket.org:%s/%s.git',
    },
};

export function hasCloneUrlTemplate(host: Host): host is TemplatedHost {
    return Object.prototype.hasOwnProperty.call(CLONE_URL_TEMPLATES, host);
}

export function cloneUrlTemplate(host: TemplatedHost, isPrivate: boolean): string {
    return CLONE_URL_TEMPLATES[host][isPrivate ? Visibility.Private : Visibility.Public];
}

export function cloneUrl(host: TemplatedHost, owner: string, name: string, isPrivate: boolean): string {
    return format(cloneUrlTemplate(host, isPrivate), owner, name);
}
