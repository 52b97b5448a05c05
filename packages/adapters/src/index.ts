export * from './awdpay/index.js';
