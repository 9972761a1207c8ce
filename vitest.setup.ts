// Nest decorators read and write through the Reflect metadata API
import 'reflect-metadata';
