import swaggerJsdoc from 'swagger-jsdoc';
import { config } from '../config/environment';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Ride Records API',
      version: '1.0.0',
      description: 'Users, rides and ride events with distance-ranked ride listings',
      contact: {
        name: 'API Support'
      }
    },
    servers: [
      {
        url: `http://localhost:${config.port}`,
        description: 'Development server'
      }
    ],
    tags: [
      {
        name: 'Rides',
        description: 'Ride management endpoints'
      },
      {
        name: 'Users',
        description: 'User management endpoints'
      },
      {
        name: 'RideEvents',
        description: 'Ride event endpoints'
      },
      {
        name: 'Reports',
        description: 'Reporting endpoints'
      }
    ]
  },
  apis: ['./src/api/routes.ts', './src/api/userRoutes.ts', './src/api/rideEventRoutes.ts', './src/api/reportRoutes.ts']
};

export const swaggerSpec = swaggerJsdoc(options);
