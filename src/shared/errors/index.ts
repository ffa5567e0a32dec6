export * from './LeagueDomainErrors';
